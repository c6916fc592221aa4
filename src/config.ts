import path from "path";
import { z } from "zod";

const booleanFlag = z
  .enum(["1", "0", "true", "false", "yes", "no"])
  .transform((v) => v === "1" || v === "true" || v === "yes");

const hourList = z
  .string()
  .transform((v) => v.split(",").map((h) => h.trim()).filter((h) => h.length > 0).map(Number))
  .pipe(z.array(z.number().int().min(0).max(23)).min(1));

export const EnvSchema = z.object({
  DATA_DIR: z.string().default(path.join(process.cwd(), "data")),
  DB_PATH: z.string().optional(),
  BLOB_DIR: z.string().optional(),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  INGEST_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(4),
  MAX_FAILURE_RATE: z.coerce.number().min(0).max(1).default(0.2),
  MIN_FAILURE_SAMPLE: z.coerce.number().int().min(1).default(20),
  WRITE_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  WRITE_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(200),
  RECLAIM_GRACE_HOURS: z.coerce.number().min(0).default(24),
  SNAPSHOT_RETENTION: z.coerce.number().int().min(0).default(0),
  SCHEDULE_HOURS: hourList.default("0,6,12,18"),
  MAILS_PER_USER: z.coerce.number().int().min(1).optional(),
  DOWNLOAD_ATTACHMENTS: booleanFlag.default("true"),
});

export interface AppConfig {
  dataDir: string;
  dbPath: string;
  blobDir: string;
  port: number;
  ingest: {
    concurrency: number;
    maxFailureRate: number;
    minFailureSample: number;
  };
  store: {
    writeAttempts: number;
    writeRetryDelayMs: number;
    reclaimGraceMs: number;
  };
  snapshotRetention: number;
  scheduleHours: number[];
  fetch: {
    mailsPerUser: number | null;
    downloadAttachments: boolean;
  };
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Reads the configuration from environment variables (after dotenv). */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;

  return {
    dataDir: e.DATA_DIR,
    dbPath: e.DB_PATH ?? path.join(e.DATA_DIR, "mailvault.db"),
    blobDir: e.BLOB_DIR ?? path.join(e.DATA_DIR, "blobs"),
    port: e.PORT,
    ingest: {
      concurrency: e.INGEST_CONCURRENCY,
      maxFailureRate: e.MAX_FAILURE_RATE,
      minFailureSample: e.MIN_FAILURE_SAMPLE,
    },
    store: {
      writeAttempts: e.WRITE_ATTEMPTS,
      writeRetryDelayMs: e.WRITE_RETRY_DELAY_MS,
      reclaimGraceMs: e.RECLAIM_GRACE_HOURS * 3_600_000,
    },
    snapshotRetention: e.SNAPSHOT_RETENTION,
    scheduleHours: [...new Set(e.SCHEDULE_HOURS)].sort((a, b) => a - b),
    fetch: {
      mailsPerUser: e.MAILS_PER_USER ?? null,
      downloadAttachments: e.DOWNLOAD_ATTACHMENTS,
    },
  };
}
