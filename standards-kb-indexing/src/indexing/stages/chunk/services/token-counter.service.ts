import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { getEncoding, Tiktoken, type TiktokenEncoding } from 'js-tiktoken';
import { TokenizerError } from '../errors';
import type { Tokenizer } from '../types';

/** Injection token for the chunker's Tokenizer */
export const TOKENIZER = Symbol('TOKENIZER');

const SUPPORTED_ENCODINGS: readonly TiktokenEncoding[] = [
  'cl100k_base',
  'o200k_base',
  'p50k_base',
  'r50k_base',
];

const DEFAULT_ENCODING: TiktokenEncoding = 'cl100k_base';

/**
 * Token Counter Service
 * js-tiktoken BPE tokenizer; special-token strings in the text are encoded
 * as ordinary text
 */
@Injectable()
export class TokenCounterService implements Tokenizer {
  private readonly logger = new Logger(TokenCounterService.name);
  private readonly encoding: Tiktoken;
  readonly encodingName: TiktokenEncoding;

  constructor(configService: ConfigService) {
    this.encodingName = resolveEncoding(
      configService.get<string>('TOKENIZER_ENCODING', DEFAULT_ENCODING),
    );

    try {
      this.encoding = getEncoding(this.encodingName);
    } catch (error) {
      throw new TokenizerError(
        `Failed to initialize tokenizer ${this.encodingName}`,
        error instanceof Error ? error : undefined,
      );
    }

    this.logger.log(
      `Token counter initialized with encoding: ${this.encodingName}`,
    );
  }

  countTokens(text: string): number {
    return this.encode(text).length;
  }

  tailTokens(text: string, maxTokens: number): string {
    if (maxTokens <= 0) {
      return '';
    }
    const tokens = this.encode(text);
    if (tokens.length <= maxTokens) {
      return text;
    }
    return this.encoding.decode(tokens.slice(tokens.length - maxTokens));
  }

  private encode(text: string): number[] {
    try {
      return this.encoding.encode(text, [], []);
    } catch (error) {
      this.logger.error('Token encoding failed', error);
      throw new TokenizerError(
        `Failed to encode text of length ${text.length}`,
        error instanceof Error ? error : undefined,
      );
    }
  }
}

function resolveEncoding(name: string): TiktokenEncoding {
  const encoding = SUPPORTED_ENCODINGS.find((candidate) => candidate === name);
  if (!encoding) {
    throw new TokenizerError(
      `Unsupported tokenizer encoding "${name}", expected one of ${SUPPORTED_ENCODINGS.join(', ')}`,
    );
  }
  return encoding;
}
