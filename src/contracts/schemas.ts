import { z } from 'zod'

// Validated as entries: z.record drops a "__proto__" key
export const StateSchema = z.preprocess(
  (value) => (typeof value === 'object' && value !== null && !Array.isArray(value) ? Object.entries(value) : value),
  z.array(z.tuple([z.string(), z.string()]), {
    invalid_type_error: 'Expected an object of key to fingerprint',
  })
).transform((entries): Record<string, string> => Object.fromEntries(entries))

// Ingestion / persistence record
export const JobRecordSchema = z.object({
  job_id: z.number().int().positive().max(Number.MAX_SAFE_INTEGER),
  timestamp: z.string().min(1),
  latency_ms: z.number().int().nonnegative(),
  state: StateSchema,
})

export const JobRecordListSchema = z.array(JobRecordSchema)

export const WarehouseRowSchema = z.object({
  timestamp: z.string(),
  job_id: z.string(),
  latency_ms: z.number(),
  total_added: z.number().int(),
  total_removed: z.number().int(),
  total_modified: z.number().int(),
  total_unchanged: z.number().int(),
})

// Config schema
export const BuildTraceConfigSchema = z.object({
  storage: z.object({
    dataDir: z.string().min(1).optional(),
  }).default({}),
  warehouse: z.object({
    kind: z.enum(['jsonl', 'http', 'none']).default('jsonl'),
    path: z.string().min(1).optional(),
    url: z.string().url().optional(),
    timeoutMs: z.number().int().positive().default(5000),
  }).default({
    kind: 'jsonl',
    timeoutMs: 5000,
  }),
  predecessor: z.object({
    strategy: z.enum(['decrement', 'last-known']).default('decrement'),
  }).default({
    strategy: 'decrement',
  }),
  report: z.object({
    describer: z.enum(['geometry', 'opaque']).default('geometry'),
  }).default({
    describer: 'geometry',
  }),
  server: z.object({
    host: z.string().default('0.0.0.0'),
    port: z.number().int().min(0).max(65535).default(8080),
  }).default({
    host: '0.0.0.0',
    port: 8080,
  }),
})

export type ParsedBuildTraceConfig = z.infer<typeof BuildTraceConfigSchema>
