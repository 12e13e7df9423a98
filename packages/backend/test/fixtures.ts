/**
 * Shared chart text for backend tests
 *
 * Three measures at 120 BPM then 240 BPM from measure 2, with a 0.25 s offset.
 */
export const SIMFILE = [
  '#TITLE:Test Song;',
  '#ARTIST:Nobody;',
  '#OFFSET:-0.25;',
  '#BPMS:0=120,',
  '2=240;',
  '#NOTES:dance-single:',
  ':',
  'Beginner:',
  '1:',
  '0,0,0,0,0:',
  '1000',
  '0100',
  '0010',
  '0001',
  ',',
  '2000',
  '0000',
  '3000',
  '0000',
  ',  // measure 2',
  'M00F',
  '0L40',
  '0000',
  ';',
].join('\n')

/**
 * Build a file from a BPMS value and raw NOTES grid lines
 */
export function simfile(bpms: string, grid: string[], extra: string = ''): string {
  return [
    extra,
    `#BPMS:${bpms};`,
    '#NOTES:dance-single:',
    ':',
    'Beginner:',
    '1:',
    '0,0,0,0,0:',
    ...grid,
    ';',
  ].join('\n')
}
