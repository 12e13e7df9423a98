/**
 * Letter grades for a wife score
 */

export type LetterGrade = 'AAAA' | 'AAA' | 'AA' | 'A' | 'B' | 'C' | 'D'

/** Grade thresholds (percentage required), best first */
export const GRADE_THRESHOLDS: ReadonlyArray<{ grade: LetterGrade; threshold: number }> = [
  { grade: 'AAAA', threshold: 99.955 },
  { grade: 'AAA', threshold: 99.7 },
  { grade: 'AA', threshold: 93 },
  { grade: 'A', threshold: 80 },
  { grade: 'B', threshold: 70 },
  { grade: 'C', threshold: 60 },
  { grade: 'D', threshold: -Infinity },
]

/**
 * @param score - Ratio from calculateScore (1.0 = perfect)
 */
export function letterGrade(score: number): LetterGrade {
  const percent = score * 100
  for (const { grade, threshold } of GRADE_THRESHOLDS) {
    if (percent >= threshold) return grade
  }
  return 'D'
}
