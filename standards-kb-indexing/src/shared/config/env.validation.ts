import { plainToInstance } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';

/**
 * Environment of the indexing service. Defaults apply when a variable is
 * absent; cross-field rules (overlap below max) are enforced by the chunker.
 */
export class IndexingEnvironment {
  @IsOptional()
  @IsIn(['development', 'production', 'test'])
  declare NODE_ENV?: string;

  @IsOptional()
  @IsString()
  declare LOG_LEVEL?: string;

  @IsInt()
  @Min(1)
  @Max(65535)
  INDEXING_PORT: number = 50052;

  @IsInt()
  @Min(1)
  @Max(65535)
  INDEXING_TCP_PORT: number = 4003;

  @IsInt()
  @Min(1)
  CHUNK_SIZE_MIN: number = 100;

  @IsInt()
  @Min(1)
  CHUNK_SIZE_MAX: number = 800;

  @IsInt()
  @Min(0)
  CHUNK_OVERLAP: number = 100;

  @IsIn(['cl100k_base', 'o200k_base', 'p50k_base', 'r50k_base'])
  TOKENIZER_ENCODING: string = 'cl100k_base';
}

export function validateEnv(
  config: Record<string, unknown>,
): IndexingEnvironment {
  const validated = plainToInstance(IndexingEnvironment, config, {
    enableImplicitConversion: true,
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
