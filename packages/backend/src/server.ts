import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify'
import fastifyCors from '@fastify/cors'
import fastifyMultipart from '@fastify/multipart'
import type { NoteType, Quantization, ResolvedTempoSegment, Simfile } from '@stepchart/shared'
import { NOTE_TYPES } from '@stepchart/shared'
import type { AppConfig } from './config.js'
import { parseSimfile } from './parsers/index.js'
import { quantizationOf, resolveTempoMap, offsetMsOf, toTimingData } from './timing/index.js'
import { ScoreKeeper } from './runtime/index.js'

interface ParseBody {
  text: string
}

interface TimingBody {
  text: string
  chart?: number
  rate?: number
}

interface ScoreBody {
  records: Array<{ offset: number | null; type: NoteType }>
  ts?: number
}

const parseSchema = {
  body: {
    type: 'object',
    required: ['text'],
    properties: {
      text: { type: 'string' },
    },
  },
} as const

const timingSchema = {
  body: {
    type: 'object',
    required: ['text'],
    properties: {
      text: { type: 'string' },
      chart: { type: 'integer', minimum: 0 },
      rate: { type: 'number', exclusiveMinimum: 0 },
    },
  },
} as const

const scoreSchema = {
  body: {
    type: 'object',
    required: ['records'],
    properties: {
      records: {
        type: 'array',
        items: {
          type: 'object',
          required: ['offset', 'type'],
          properties: {
            offset: { type: 'number', nullable: true },
            type: { type: 'string', enum: NOTE_TYPES },
          },
        },
      },
      ts: { type: 'number', exclusiveMinimum: 0 },
    },
  },
} as const

/**
 * Parsed file as sent to clients: positions serialize as "n/d"
 */
function summarize(simfile: Simfile) {
  return {
    metadata: simfile.metadata,
    charts: simfile.charts.map(chart => ({
      measureCount: chart.measures.length,
      noteCount: chart.measures.reduce(
        (sum, measure) => sum + measure.reduce((n, { row }) => n + row.notes.length, 0),
        0
      ),
      measures: chart.measures,
    })),
  }
}

function serializeSegment(segment: ResolvedTempoSegment) {
  return {
    measure: segment.measure,
    position: segment.position.toString(),
    bpm: segment.bpm,
    startMs: segment.startMs,
  }
}

function loggerOptions(config: AppConfig): FastifyServerOptions['logger'] {
  if (!config.prettyLogs) {
    return { level: config.logLevel }
  }
  return {
    level: config.logLevel,
    transport: {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname'
      }
    }
  }
}

/**
 * Build the HTTP app without listening (tests drive it with inject)
 */
export async function buildServer(config: AppConfig): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: loggerOptions(config)
  })

  // CORS, only for an explicitly configured origin
  if (config.corsOrigin) {
    await fastify.register(fastifyCors, {
      origin: config.corsOrigin,
      credentials: true
    })
  }

  // Multipart for chart uploads
  await fastify.register(fastifyMultipart, {
    limits: {
      fileSize: config.maxUploadSize
    }
  })

  // Health check
  fastify.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() }
  })

  fastify.post<{ Body: ParseBody }>('/api/charts/parse', { schema: parseSchema }, async (request) => {
    return summarize(parseSimfile(request.body.text))
  })

  fastify.post('/api/charts/upload', async (request, reply) => {
    const file = await request.file()
    if (!file) {
      return reply.code(400).send({ error: 'Expected a chart file in field "file"' })
    }
    const buffer = await file.toBuffer()
    const text = buffer.toString('utf8')
    request.log.info({ filename: file.filename, bytes: buffer.length }, 'chart uploaded')
    return { filename: file.filename, bytes: buffer.length, ...summarize(parseSimfile(text)) }
  })

  fastify.post<{ Body: TimingBody }>('/api/charts/timing', { schema: timingSchema }, async (request, reply) => {
    const { text, chart: index = 0, rate = config.defaultRate } = request.body
    const simfile = parseSimfile(text)
    const chart = simfile.charts[index]
    if (!chart) {
      return reply.code(404).send({ error: `Chart ${index} not found (file has ${simfile.charts.length})` })
    }

    const segments = resolveTempoMap(chart.metadata.bpms, offsetMsOf(chart.metadata))
    const timing = toTimingData(
      chart,
      segments,
      (_measure, _reserved, position): { quantization: Quantization } => ({
        quantization: quantizationOf(position),
      }),
      {
        rate,
        onDroppedNote: (note) => {
          request.log.warn(
            { measure: note.measure, position: note.position.toString(), column: note.column },
            'dropped note outside playfield'
          )
        },
      }
    )

    return {
      title: chart.metadata.title ?? null,
      rate,
      segments: segments.map(serializeSegment),
      columns: timing.columns(),
    }
  })

  fastify.post<{ Body: ScoreBody }>('/api/score', { schema: scoreSchema }, async (request, reply) => {
    const keeper = new ScoreKeeper(request.body.ts ?? config.timingScale)
    keeper.addAll(request.body.records)
    if (!keeper.hasScorableNotes()) {
      return reply.code(422).send({ error: 'No scorable notes' })
    }
    const { score, points, maxPoints, count, grade } = keeper.getStats()
    return { score, points, maxPoints, count, grade }
  })

  return fastify
}

export async function startServer(config: AppConfig): Promise<FastifyInstance> {
  const fastify = await buildServer(config)
  await fastify.listen({ port: config.port, host: config.host })
  return fastify
}
