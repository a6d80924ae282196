/**
 * Search Request DTO
 * Payload of the search TCP command
 */

import {
  IsBoolean,
  IsInt,
  IsObject,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';

export class SearchRequestDto {
  @IsString()
  declare query: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(100)
  declare nResults?: number;

  // Exact-match conditions on stored payload fields, semantic side only
  @IsOptional()
  @IsObject()
  declare filters?: Record<string, string | number | boolean>;

  @IsOptional()
  @IsBoolean()
  declare includeCitations?: boolean;
}
