import { plainToInstance } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export class RetrievalEnvironment {
  @IsOptional()
  @IsIn(['development', 'production', 'test'])
  declare NODE_ENV?: string;

  @IsOptional()
  @IsString()
  declare LOG_LEVEL?: string;

  @IsInt()
  @Min(1)
  @Max(65535)
  RETRIEVAL_PORT: number = 50056;

  @IsInt()
  @Min(1)
  @Max(65535)
  RETRIEVAL_TCP_PORT: number = 4005;

  @IsUrl({ require_tld: false })
  QDRANT_URL: string = 'http://localhost:6333';

  @IsOptional()
  @IsString()
  declare QDRANT_API_KEY?: string;

  @IsString()
  QDRANT_COLLECTION: string = 'standards_chunks';

  @IsIn(['ollama', 'openai'])
  EMBEDDING_PROVIDER: string = 'ollama';

  @IsOptional()
  @IsString()
  declare OLLAMA_BASE_URL?: string;

  @IsOptional()
  @IsString()
  declare OLLAMA_EMBEDDING_MODEL?: string;

  @IsOptional()
  @IsString()
  declare OPENAI_API_KEY?: string;

  @IsOptional()
  @IsString()
  declare OPENAI_EMBEDDING_MODEL?: string;

  @IsNumber()
  @Min(0)
  @Max(1)
  COVERAGE_SIMILARITY_THRESHOLD: number = 0.5;

  @IsNumber()
  @Min(0)
  @Max(1)
  COVERAGE_HIGH_CONFIDENCE_THRESHOLD: number = 0.3;

  @IsInt()
  @Min(1)
  COVERAGE_N_RESULTS: number = 10;

  @IsNumber()
  @Min(0)
  @Max(0.5)
  COVERAGE_ENTROPY_WEIGHT: number = 0.3;

  @IsInt()
  @Min(1)
  COVERAGE_MAX_CONCURRENCY: number = 5;
}

export function validateEnv(
  config: Record<string, unknown>,
): RetrievalEnvironment {
  const validated = plainToInstance(RetrievalEnvironment, config, {
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
