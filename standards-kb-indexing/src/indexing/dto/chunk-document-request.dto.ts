/**
 * Chunk Document Request DTO
 * Payload of the chunk_document TCP command
 */

import { Type } from 'class-transformer';
import {
  IsArray,
  IsInt,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  Min,
  ValidateNested,
} from 'class-validator';

export class DocumentMetadataDto {
  @IsString()
  @IsNotEmpty()
  declare documentId: string;

  @IsString()
  declare documentTitle: string;

  @IsString()
  declare documentType: string;
}

export class ParsedElementMetadataDto {
  [key: string]: unknown;

  @IsOptional()
  @IsArray()
  @IsArray({ each: true })
  declare tableData?: string[][];

  @IsOptional()
  @IsString()
  declare caption?: string;
}

export class ParsedElementDto {
  // Unknown types are accepted here and skipped by the chunker
  @IsString()
  declare elementType: string;

  @IsString()
  declare content: string;

  @IsArray()
  @IsString({ each: true })
  declare sectionHierarchy: string[];

  @IsOptional()
  @IsString()
  declare heading?: string | null;

  @IsArray()
  @IsInt({ each: true })
  @Min(1, { each: true })
  declare pageNumbers: number[];

  @IsOptional()
  @IsObject()
  @ValidateNested()
  @Type(() => ParsedElementMetadataDto)
  declare metadata?: ParsedElementMetadataDto;
}

export class ChunkDocumentRequestDto {
  @ValidateNested()
  @Type(() => DocumentMetadataDto)
  declare document: DocumentMetadataDto;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => ParsedElementDto)
  declare elements: ParsedElementDto[];
}
