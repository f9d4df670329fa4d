import path from 'node:path';
import { Type, plainToInstance } from 'class-transformer';
import { IsInt, IsNotEmpty, IsOptional, IsString, Max, Min, validateSync } from 'class-validator';

export const CATALOG_CONFIG = Symbol('CATALOG_CONFIG');

export interface CatalogConfig {
  dataDir: string;
  backupsDir: string;
  ownerActId: string;
  maxBackups: number;
  port: number;
}

class CatalogEnvironment {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  CATALOG_DATA_DIR?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  CATALOG_BACKUPS_DIR?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  CATALOG_OWNER?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  CATALOG_MAX_BACKUPS?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT?: number;
}

export function loadCatalogConfig(env: NodeJS.ProcessEnv = process.env): CatalogConfig {
  const parsed = plainToInstance(CatalogEnvironment, env);
  const errors = validateSync(parsed);
  if (errors.length) {
    const details = errors.flatMap((error) => Object.values(error.constraints ?? {}));
    throw new Error(`Invalid catalog configuration: ${details.join('; ')}`);
  }

  return {
    dataDir: path.resolve(parsed.CATALOG_DATA_DIR ?? 'data'),
    backupsDir: path.resolve(parsed.CATALOG_BACKUPS_DIR ?? 'backups'),
    ownerActId: parsed.CATALOG_OWNER ?? 'PARK_BELLEVUE',
    maxBackups: parsed.CATALOG_MAX_BACKUPS ?? 10,
    port: parsed.PORT ?? 3000,
  };
}
