/**
 * Build Lexical Index Request DTO
 * Payload of the build_lexical_index TCP command
 */

import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';

export class LexicalDocumentDto {
  @IsString()
  @IsNotEmpty()
  declare id: string;

  @IsString()
  declare content: string;

  @IsOptional()
  @IsObject()
  declare metadata?: Record<string, unknown>;
}

export class BuildLexicalIndexRequestDto {
  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => LexicalDocumentDto)
  declare documents: LexicalDocumentDto[];
}
