/**
 * Assess Coverage Request DTO
 * Payload of the assess_coverage TCP command
 */

import {
  IsArray,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';

export class AssessCoverageRequestDto {
  @IsArray()
  @IsString({ each: true })
  declare areas: string[];

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  declare similarityThreshold?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  declare highConfidenceThreshold?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(100)
  declare nResults?: number;
}
