import { plainToInstance, Transform, TransformFnParams } from 'class-transformer';
import { IsIn, IsInt, IsOptional, IsString, IsUrl, Max, Min, validateSync } from 'class-validator';

const BOOLEAN_VALUES = ['true', 'false', '1', '0', 'yes', 'no'];

const toNumber = ({ value }: TransformFnParams) =>
  value === undefined || value === '' ? undefined : parseInt(value, 10);

const toLowerCase = ({ value }: TransformFnParams) =>
  typeof value === 'string' ? value.toLowerCase() : value;

export class EnvironmentVariables {
  @IsOptional()
  @IsUrl({ require_tld: false })
  CATALOG_BASE_URL?: string;

  @IsOptional()
  @IsString()
  CATALOG_LIST_PATH?: string;

  @IsOptional()
  @IsString()
  CATALOG_DETAIL_PATH?: string;

  @IsOptional()
  @Transform(toNumber)
  @IsInt()
  @Min(1)
  @Max(64)
  CATALOG_PAGE_SIZE?: number;

  @IsOptional()
  @Transform(toNumber)
  @IsInt()
  @Min(1000)
  CATALOG_TIMEOUT_MS?: number;

  @IsOptional()
  @IsString()
  REDIS_URL?: string;

  @IsOptional()
  @IsString()
  REDIS_HOST?: string;

  @IsOptional()
  @Transform(toNumber)
  @IsInt()
  @Min(1)
  @Max(65535)
  REDIS_PORT?: number;

  @IsOptional()
  @IsString()
  REDIS_KEY_PREFIX?: string;

  // Pacing keeps the upstream from throttling us; it can be tuned but not switched off.
  @IsOptional()
  @Transform(toNumber)
  @IsInt()
  @Min(1)
  SYNC_DETAIL_DELAY_MS?: number;

  @IsOptional()
  @Transform(toNumber)
  @IsInt()
  @Min(1)
  SYNC_PAGE_DELAY_MS?: number;

  @IsOptional()
  @Transform(toNumber)
  @IsInt()
  @Min(0)
  SYNC_MAX_PAGES?: number;

  @IsOptional()
  @Transform(toLowerCase)
  @IsIn(BOOLEAN_VALUES)
  SYNC_STOP_ON_UNCHANGED?: string;

  @IsOptional()
  @Transform(toLowerCase)
  @IsIn(BOOLEAN_VALUES)
  SYNC_LOCAL_CACHE?: string;

  @IsOptional()
  @Transform(toLowerCase)
  @IsIn(BOOLEAN_VALUES)
  SYNC_WARM_CACHE?: string;
}

export function validateEnv(config: Record<string, unknown>) {
  const validated = plainToInstance(EnvironmentVariables, config);
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid environment: ${details}`);
  }

  return { ...validated };
}
