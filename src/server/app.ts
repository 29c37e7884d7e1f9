import express, { ErrorRequestHandler } from 'express'
import { Server } from 'http'
import { ReportService } from '../service/ReportService'
import {
  JobRecordListSchema,
  NotFoundError,
  SnapshotConflictError,
  StoreUnavailableError,
  errorMessage,
} from '../contracts'

export const SERVICE_NAME = 'buildtrace'

export function createApp(service: ReportService): express.Express {
  const app = express()
  app.use(express.json({ limit: '16mb' }))

  app.get('/health', (_req, res) => {
    res.json({ status: 'SUCCESS', service: SERVICE_NAME })
  })

  app.post('/process', async (req, res) => {
    const parsed = JobRecordListSchema.safeParse(req.body)
    if (!parsed.success) {
      return res.status(400).json({ detail: 'Invalid job records.', issues: parsed.error.issues })
    }

    try {
      const accepted = await service.ingest(parsed.data)
      return res.status(202).json({
        status: 'Jobs accepted and state stored. Ready for reporting.',
        accepted,
      })
    } catch (error) {
      if (error instanceof SnapshotConflictError) {
        return res.status(409).json({ detail: `${error.message}.` })
      }
      console.error(`Failed to store job state: ${errorMessage(error)}`)
      const detail = error instanceof StoreUnavailableError && error.jobId !== null
        ? `Failed to save job state for ${error.jobId}.`
        : 'Failed to save job state.'
      return res.status(500).json({ detail })
    }
  })

  app.get('/report/:jobId', async (req, res) => {
    const raw = req.params.jobId
    const jobId = Number(raw)
    if (!/^\d+$/.test(raw) || !Number.isSafeInteger(jobId) || jobId <= 0) {
      return res.status(400).json({ detail: 'Job ID must be positive.' })
    }

    try {
      return res.json(await service.report(jobId))
    } catch (error) {
      if (error instanceof NotFoundError) {
        return res.status(404).json({ detail: error.message })
      }
      console.error(`Error generating report for Job ${jobId}: ${errorMessage(error)}`)
      const detail = error instanceof StoreUnavailableError
        ? 'Snapshot store unavailable.'
        : 'Internal analysis failed.'
      return res.status(500).json({ detail })
    }
  })

  // Body parser failures (malformed JSON, oversized payloads)
  const handleError: ErrorRequestHandler = (error, _req, res, next) => {
    if (res.headersSent) {
      return next(error)
    }
    const status = typeof error?.status === 'number' ? error.status : 500
    res.status(status).json({ detail: status === 500 ? 'Internal server error.' : errorMessage(error) })
  }
  app.use(handleError)

  return app
}

export function startServer(
  service: ReportService,
  options: { host: string; port: number }
): Promise<Server> {
  const app = createApp(service)
  return new Promise((resolve, reject) => {
    const server = app.listen(options.port, options.host, () => resolve(server))
    server.once('error', reject)
  })
}
