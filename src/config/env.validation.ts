import { plainToInstance, Transform } from 'class-transformer';
import {
  IsBoolean,
  IsEmail,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export const NODE_ENVIRONMENTS = ['development', 'production', 'test'] as const;
export const FANOUT_BACKENDS = ['postgres', 'memory'] as const;

export type FanoutBackend = (typeof FANOUT_BACKENDS)[number];

function parseFlag(value: unknown): boolean {
  return value === true || value === 'true' || value === '1';
}

/**
 * Process environment after validation and numeric conversion.
 * Defaults here are the ones the service runs with when a variable is unset.
 */
export class EnvironmentVariables {
  @IsString()
  @IsNotEmpty()
  DATABASE_URL!: string;

  @IsString()
  @IsNotEmpty()
  JWT_SECRET!: string;

  @IsIn(NODE_ENVIRONMENTS)
  NODE_ENV: (typeof NODE_ENVIRONMENTS)[number] = 'development';

  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 3000;

  @IsUrl({ require_tld: false })
  APP_BASE_URL: string = 'http://localhost:3000';

  // ---- worker ----

  @IsInt()
  @Min(1)
  NOTIFICATION_MAX_RETRIES: number = 3;

  @IsInt()
  @Min(1)
  @Max(1000)
  NOTIFICATION_WORKER_BATCH_SIZE: number = 10;

  @IsInt()
  @Min(0)
  NOTIFICATION_WORKER_POLL_INTERVAL_MS: number = 10_000;

  @IsInt()
  @Min(0)
  NOTIFICATION_WORKER_ERROR_RETRY_INTERVAL_MS: number = 30_000;

  @IsInt()
  @Min(0)
  NOTIFICATION_RETRY_BACKOFF_MS: number = 300_000;

  /** Run the worker loop inside the API process as well. */
  @Transform(({ obj }) => parseFlag(obj.NOTIFICATION_WORKER_EMBEDDED))
  @IsBoolean()
  NOTIFICATION_WORKER_EMBEDDED: boolean = false;

  /** 0 disables stale SENDING recovery */
  @IsInt()
  @Min(0)
  NOTIFICATION_STALE_SENDING_TIMEOUT_MS: number = 0;

  // ---- realtime ----

  @IsIn(FANOUT_BACKENDS)
  NOTIFICATION_FANOUT_BACKEND: FanoutBackend = 'postgres';

  @IsInt()
  @Min(1024)
  REALTIME_MAX_BUFFERED_BYTES: number = 1_048_576;

  // ---- smtp ----

  @IsOptional()
  @IsString()
  EMAIL_HOST?: string;

  @IsInt()
  @Min(1)
  @Max(65535)
  EMAIL_PORT: number = 465;

  @IsOptional()
  @IsString()
  EMAIL_USER?: string;

  @IsOptional()
  @IsString()
  EMAIL_PASSWORD?: string;

  @IsEmail({ require_tld: false })
  EMAIL_FROM: string = 'noreply@notifications.local';

  @IsInt()
  @Min(1)
  EMAIL_TIMEOUT_MS: number = 10_000;
}

/**
 * `ConfigModule.forRoot({ validate })` hook. Throws one error naming every
 * offending variable so a misconfigured deploy fails at boot.
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  // Empty strings from .env templates mean "unset".
  const present = Object.fromEntries(
    Object.entries(config).filter(([, value]) => value !== ''),
  );

  const validated = plainToInstance(EnvironmentVariables, present, {
    enableImplicitConversion: true,
    exposeDefaultValues: true,
  });

  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map(
        (error) =>
          `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`,
      )
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return validated;
}
