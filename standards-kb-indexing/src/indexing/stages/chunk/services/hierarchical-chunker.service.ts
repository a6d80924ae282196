import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RecursiveCharacterTextSplitter } from '@langchain/textsplitters';
import { ChunkConfigError, MalformedElementError } from '../errors';
import {
  ELEMENT_TYPES,
  type ChunkingOptions,
  type ChunkingReport,
  type ChunkResult,
  type ChunkStatistics,
  type ChunkType,
  type DocumentMetadata,
  type ElementType,
  type ParsedElement,
  type RawParsedElement,
  type SkippedElement,
  type Tokenizer,
} from '../types';
import { TOKENIZER } from './token-counter.service';
import {
  EMPTY_SECTION_STACK,
  enterSection,
  innermostSection,
  type SectionStack,
} from './section-stack';
import { extractClauseNumber, matchClauseNumber } from './clause-number';
import { renderTable } from './table-renderer';

const DEFAULT_OPTIONS: ChunkingOptions = {
  chunkSizeMin: 100,
  chunkSizeMax: 800,
  chunkOverlap: 100,
};

interface TextBuffer {
  readonly parts: readonly string[];
  readonly pageNumbers: readonly number[];
  /** Pages of the element appended last; carried with the overlap */
  readonly lastPageNumbers: readonly number[];
  readonly hasOverlap: boolean;
  /** false while the buffer holds nothing but carried-over overlap */
  readonly hasFreshContent: boolean;
}

const EMPTY_BUFFER: TextBuffer = {
  parts: [],
  pageNumbers: [],
  lastPageNumbers: [],
  hasOverlap: false,
  hasFreshContent: false,
};

interface PendingHeading {
  title: string;
  sectionHierarchy: SectionStack;
  pageNumbers: readonly number[];
}

/** Mutable state of one chunking pass */
class ChunkWalk {
  readonly chunks: ChunkResult[] = [];
  readonly skipped: SkippedElement[] = [];
  stack: SectionStack = EMPTY_SECTION_STACK;
  buffer: TextBuffer = EMPTY_BUFFER;
  pendingHeading: PendingHeading | null = null;
}

/**
 * Hierarchical Chunker Service
 * Turns parsed document elements into token-bounded chunks that keep the
 * section path, clause number and page provenance of their source. Tables
 * are emitted whole as a single chunk, whatever their size; headings open
 * the chunk of the body text that follows them.
 */
@Injectable()
export class HierarchicalChunkerService {
  private readonly logger = new Logger(HierarchicalChunkerService.name);
  private readonly options: ChunkingOptions;
  private readonly splitter: RecursiveCharacterTextSplitter;

  constructor(
    @Inject(TOKENIZER) private readonly tokenizer: Tokenizer,
    configService: ConfigService,
  ) {
    this.options = resolveChunkingOptions(configService);
    this.splitter = new RecursiveCharacterTextSplitter({
      chunkSize: this.options.chunkSizeMax,
      chunkOverlap: this.options.chunkOverlap,
      separators: ['\n\n', '\n', '. ', ' ', ''],
      lengthFunction: (text: string) => this.tokenizer.countTokens(text),
    });
  }

  /**
   * Chunk a document's elements. Elements of unknown type are skipped with
   * a warning.
   */
  async chunk(
    elements: readonly RawParsedElement[],
    document: DocumentMetadata,
  ): Promise<ChunkResult[]> {
    const report = await this.chunkWithReport(elements, document);
    if (report.skippedElements.length > 0) {
      this.logger.warn(
        `[Chunker] document=${document.documentId} skipped=${report.skippedElements.length} elements of unknown type`,
      );
    }
    return report.chunks;
  }

  async chunkWithReport(
    elements: readonly RawParsedElement[],
    document: DocumentMetadata,
  ): Promise<ChunkingReport> {
    const walk = new ChunkWalk();

    for (const [index, raw] of elements.entries()) {
      const elementType = asElementType(raw.elementType);
      if (!elementType) {
        const error = new MalformedElementError(
          `Unknown element type "${raw.elementType}" at index ${index}`,
          index,
          raw.elementType,
        );
        this.logger.debug(`[Chunker] ${error.message}`);
        walk.skipped.push({
          index,
          elementType: raw.elementType,
          reason: error.message,
        });
        continue;
      }

      const element: ParsedElement = { ...raw, elementType };
      switch (element.elementType) {
        case 'heading':
          await this.handleHeading(walk, element);
          break;
        case 'table':
          await this.handleTable(walk, element);
          break;
        case 'paragraph':
        case 'list':
        case 'code':
        case 'figure':
          await this.handleBody(walk, element);
          break;
      }
    }

    await this.flushBuffer(walk, false);
    this.emitPendingHeading(walk);

    const statistics = this.computeStatistics(
      walk.chunks,
      elements.length,
      walk.skipped.length,
    );

    this.logger.log(
      `[Chunker] document=${document.documentId} elements=${elements.length} chunks=${statistics.totalChunks} ` +
        `text=${statistics.textChunks} table=${statistics.tableChunks} heading=${statistics.headingChunks} ` +
        `avgTokens=${statistics.averageTokens}`,
    );

    return {
      chunks: walk.chunks,
      skippedElements: walk.skipped,
      statistics,
    };
  }

  private async handleHeading(
    walk: ChunkWalk,
    element: ParsedElement,
  ): Promise<void> {
    await this.flushBuffer(walk, false);
    this.emitPendingHeading(walk);

    const title = element.heading?.trim() || element.content.trim();
    if (!title) {
      return;
    }

    walk.stack = enterSection(
      walk.stack,
      element.sectionHierarchy.length,
      title,
    );
    walk.pendingHeading = {
      title,
      sectionHierarchy: walk.stack,
      pageNumbers: element.pageNumbers,
    };
  }

  private async handleTable(
    walk: ChunkWalk,
    element: ParsedElement,
  ): Promise<void> {
    await this.flushBuffer(walk, false);
    this.emitPendingHeading(walk);

    const content = renderTable(element);
    if (!content) {
      return;
    }
    walk.chunks.push(
      this.buildChunk(content, walk.stack, element.pageNumbers, 'table', false),
    );
  }

  private async handleBody(
    walk: ChunkWalk,
    element: ParsedElement,
  ): Promise<void> {
    const text = bodyText(element);
    if (!text) {
      return;
    }

    const heading = walk.pendingHeading;
    if (heading) {
      walk.pendingHeading = null;
      walk.buffer = appendToBuffer(walk.buffer, heading.title, heading.pageNumbers);
    }
    walk.buffer = appendToBuffer(walk.buffer, text, element.pageNumbers);

    const bufferTokens = this.tokenizer.countTokens(joinBuffer(walk.buffer));
    if (bufferTokens >= this.options.chunkSizeMax) {
      await this.flushBuffer(walk, true);
    }
  }

  /**
   * Emit the buffer as one chunk, or several when it exceeds chunkSizeMax.
   * With `carryOverlap` the next buffer opens with the tail of the last
   * emitted chunk.
   */
  private async flushBuffer(walk: ChunkWalk, carryOverlap: boolean): Promise<void> {
    const buffer = walk.buffer;
    walk.buffer = EMPTY_BUFFER;
    if (!buffer.hasFreshContent) {
      return;
    }

    const pieces = await this.splitOversized(joinBuffer(buffer));
    pieces.forEach((piece, index) => {
      walk.chunks.push(
        this.buildChunk(
          piece,
          walk.stack,
          buffer.pageNumbers,
          'text',
          index === 0 ? buffer.hasOverlap : this.options.chunkOverlap > 0,
        ),
      );
    });

    if (!carryOverlap || this.options.chunkOverlap === 0) {
      return;
    }
    const overlap = this.tokenizer
      .tailTokens(pieces[pieces.length - 1], this.options.chunkOverlap)
      .trim();
    if (overlap) {
      walk.buffer = {
        parts: [overlap],
        pageNumbers: buffer.lastPageNumbers,
        lastPageNumbers: buffer.lastPageNumbers,
        hasOverlap: true,
        hasFreshContent: false,
      };
    }
  }

  private async splitOversized(text: string): Promise<string[]> {
    if (this.tokenizer.countTokens(text) <= this.options.chunkSizeMax) {
      return [text];
    }
    const pieces = (await this.splitter.splitText(text))
      .map((piece) => piece.trim())
      .filter((piece) => piece.length > 0);
    this.logger.debug(
      `[Chunker] stage=split status=oversized pieces=${pieces.length}`,
    );
    return pieces.length > 0 ? pieces : [text];
  }

  private emitPendingHeading(walk: ChunkWalk): void {
    const heading = walk.pendingHeading;
    if (!heading) {
      return;
    }
    walk.pendingHeading = null;
    const chunk: ChunkResult = {
      content: heading.title,
      tokenCount: this.tokenizer.countTokens(heading.title),
      sectionHierarchy: heading.sectionHierarchy,
      clauseNumber: matchClauseNumber(heading.title),
      pageNumbers: Object.freeze([...heading.pageNumbers]),
      chunkType: 'heading',
      hasOverlap: false,
    };
    walk.chunks.push(Object.freeze(chunk));
  }

  private buildChunk(
    content: string,
    stack: SectionStack,
    pageNumbers: readonly number[],
    chunkType: ChunkType,
    hasOverlap: boolean,
  ): ChunkResult {
    const chunk: ChunkResult = {
      content,
      tokenCount: this.tokenizer.countTokens(content),
      sectionHierarchy: stack,
      clauseNumber: extractClauseNumber(innermostSection(stack), content),
      pageNumbers: Object.freeze(mergePageNumbers([], pageNumbers)),
      chunkType,
      hasOverlap,
    };
    return Object.freeze(chunk);
  }

  private computeStatistics(
    chunks: readonly ChunkResult[],
    totalElements: number,
    skippedElements: number,
  ): ChunkStatistics {
    const tokenCounts = chunks.map((chunk) => chunk.tokenCount);
    const totalTokens = tokenCounts.reduce((sum, count) => sum + count, 0);
    const countOf = (type: ChunkType): number =>
      chunks.filter((chunk) => chunk.chunkType === type).length;

    return {
      totalElements,
      processedElements: totalElements - skippedElements,
      skippedElements,
      totalChunks: chunks.length,
      textChunks: countOf('text'),
      tableChunks: countOf('table'),
      headingChunks: countOf('heading'),
      averageTokens:
        chunks.length > 0 ? Math.round(totalTokens / chunks.length) : 0,
      maxTokens: tokenCounts.length > 0 ? Math.max(...tokenCounts) : 0,
      undersizedChunks: chunks.filter(
        (chunk) =>
          chunk.chunkType === 'text' &&
          chunk.tokenCount < this.options.chunkSizeMin,
      ).length,
    };
  }
}

export function resolveChunkingOptions(
  configService: ConfigService,
): ChunkingOptions {
  const options: ChunkingOptions = {
    chunkSizeMin: Number(
      configService.get<number>('CHUNK_SIZE_MIN', DEFAULT_OPTIONS.chunkSizeMin),
    ),
    chunkSizeMax: Number(
      configService.get<number>('CHUNK_SIZE_MAX', DEFAULT_OPTIONS.chunkSizeMax),
    ),
    chunkOverlap: Number(
      configService.get<number>('CHUNK_OVERLAP', DEFAULT_OPTIONS.chunkOverlap),
    ),
  };
  validateChunkingOptions(options);
  return options;
}

export function validateChunkingOptions(options: ChunkingOptions): void {
  const { chunkSizeMin, chunkSizeMax, chunkOverlap } = options;
  if (!Number.isInteger(chunkSizeMin) || chunkSizeMin <= 0) {
    throw new ChunkConfigError(
      `chunkSizeMin must be a positive integer, got ${chunkSizeMin}`,
    );
  }
  if (!Number.isInteger(chunkSizeMax) || chunkSizeMax <= 0) {
    throw new ChunkConfigError(
      `chunkSizeMax must be a positive integer, got ${chunkSizeMax}`,
    );
  }
  if (chunkSizeMin > chunkSizeMax) {
    throw new ChunkConfigError(
      `chunkSizeMin (${chunkSizeMin}) must not exceed chunkSizeMax (${chunkSizeMax})`,
    );
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
    throw new ChunkConfigError(
      `chunkOverlap must be a non-negative integer, got ${chunkOverlap}`,
    );
  }
  if (chunkOverlap >= chunkSizeMax) {
    throw new ChunkConfigError(
      `chunkOverlap (${chunkOverlap}) must be smaller than chunkSizeMax (${chunkSizeMax})`,
    );
  }
}

function asElementType(value: string): ElementType | null {
  return ELEMENT_TYPES.find((type) => type === value) ?? null;
}

function bodyText(element: ParsedElement): string {
  if (element.elementType === 'figure') {
    return element.metadata?.caption?.trim() || element.content.trim();
  }
  return element.content.trim();
}

function joinBuffer(buffer: TextBuffer): string {
  return buffer.parts.join('\n\n');
}

function appendToBuffer(
  buffer: TextBuffer,
  text: string,
  pageNumbers: readonly number[],
): TextBuffer {
  return {
    parts: [...buffer.parts, text],
    pageNumbers: mergePageNumbers(buffer.pageNumbers, pageNumbers),
    lastPageNumbers: pageNumbers,
    hasOverlap: buffer.hasOverlap,
    hasFreshContent: true,
  };
}

/** Order-preserving union without duplicates */
function mergePageNumbers(
  current: readonly number[],
  incoming: readonly number[],
): number[] {
  const merged = [...current];
  for (const page of incoming) {
    if (!merged.includes(page)) {
      merged.push(page);
    }
  }
  return merged;
}
