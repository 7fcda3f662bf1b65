import { plainToInstance, Transform } from 'class-transformer';
import { IsBoolean, IsEnum, IsIn, IsInt, IsOptional, IsString, Min, validateSync } from 'class-validator';
import type { CircuitStateName } from '@/domain/breaker';
import { CIRCUIT_STATES, STATE_CLOSED } from '@/domain/breaker';

export enum Environment {
  Development = 'development',
  Production = 'production',
  Test = 'test',
}

export enum BreakerStorageKind {
  Memory = 'memory',
  Redis = 'redis',
}

const toInt = ({ value }: { value: unknown }) => (typeof value === 'string' ? parseInt(value, 10) : value);

const toBoolean = ({ value }: { value: unknown }) => {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') return value.toLowerCase() === 'true';
  return false;
};

export class EnvironmentVariables {
  // Application
  @IsEnum(Environment)
  @IsOptional()
  NODE_ENV: Environment = Environment.Development;

  @IsInt()
  @Min(1)
  @IsOptional()
  @Transform(toInt)
  PORT: number = 3000;

  @IsString()
  @IsOptional()
  SERVICE_NAME: string = 'gateway';

  @IsString()
  @IsOptional()
  SERVICE_UNAVAILABLE_MESSAGE: string = '{service} is currently unavailable. Please try again later.';

  // Breaker
  @IsString()
  @IsOptional()
  BREAKER_ENV: string = 'development';

  @IsInt()
  @Min(1)
  @IsOptional()
  @Transform(toInt)
  BREAKER_FAIL_MAX: number = 5;

  @IsInt()
  @Min(1)
  @IsOptional()
  @Transform(toInt)
  BREAKER_RESET_TIMEOUT_MS: number = 15000;

  @IsBoolean()
  @IsOptional()
  @Transform(toBoolean)
  BREAKER_COUNT_REJECTED_CALLS: boolean = false;

  @IsEnum(BreakerStorageKind)
  @IsOptional()
  BREAKER_STORAGE: BreakerStorageKind = BreakerStorageKind.Memory;

  @IsIn([...CIRCUIT_STATES])
  @IsOptional()
  BREAKER_FALLBACK_STATE: CircuitStateName = STATE_CLOSED;

  @IsString()
  @IsOptional()
  BREAKER_BASE_NAMESPACE: string = 'breaker';

  // Redis
  @IsString()
  @IsOptional()
  REDIS_HOST: string = 'localhost';

  @IsInt()
  @Min(1)
  @IsOptional()
  @Transform(toInt)
  REDIS_PORT: number = 6379;

  @IsInt()
  @Min(0)
  @IsOptional()
  @Transform(toInt)
  REDIS_DB: number = 3;

  // Dependencies, as `name=url` pairs separated by commas
  @IsString()
  @IsOptional()
  DEPENDENCY_URLS: string = '';
}

export function validate(config: Record<string, unknown>) {
  const validatedConfig = plainToInstance(EnvironmentVariables, config);

  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    const errorMessages = errors
      .map((error) => {
        const constraints = error.constraints ? Object.values(error.constraints).join(', ') : 'unknown error';
        return `${error.property}: ${constraints}`;
      })
      .join('\n');

    throw new Error(`Environment validation failed:\n${errorMessages}`);
  }

  return validatedConfig;
}

/** Parses `billing=http://billing:3000,users=http://users:3000` into a map. */
export function parseDependencyUrls(raw: string): Map<string, string> {
  const urls = new Map<string, string>();
  for (const entry of raw.split(',')) {
    const separator = entry.indexOf('=');
    if (separator <= 0) continue;
    const name = entry.slice(0, separator).trim();
    const url = entry.slice(separator + 1).trim();
    if (name && url) urls.set(name, url);
  }
  return urls;
}
