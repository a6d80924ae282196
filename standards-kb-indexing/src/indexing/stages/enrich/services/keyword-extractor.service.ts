/**
 * Keyword Extractor Service
 * Extracts keywords using TF-IDF over the chunks of one document
 */

import { Injectable, Logger } from '@nestjs/common';
import * as natural from 'natural';

@Injectable()
export class KeywordExtractorService {
  private readonly logger = new Logger(KeywordExtractorService.name);
  private readonly TOP_K = 10;

  /**
   * Extract keywords for every chunk, in input order
   * @param contents - Chunk texts of one document (the TF-IDF corpus)
   */
  extractKeywords(
    contents: readonly string[],
    topK: number = this.TOP_K,
  ): string[][] {
    if (contents.length === 0) {
      return [];
    }

    const tfidf = new natural.TfIdf();
    contents.forEach((content) => {
      tfidf.addDocument(this.preprocessText(content));
    });

    const keywords = contents.map((_, index) =>
      tfidf
        .listTerms(index)
        .filter((item) => !/^\d+$/.test(item.term))
        .slice(0, topK)
        .map((item) => item.term),
    );

    this.logger.debug(
      `Extracted keywords for ${contents.length} chunks using TF-IDF`,
    );
    return keywords;
  }

  /**
   * Preprocess text for TF-IDF
   * - Lowercase
   * - Remove punctuation
   * - Normalize whitespace
   */
  private preprocessText(text: string): string {
    return text
      .toLowerCase()
      .replace(/[^\w\s]/g, ' ')
      .replace(/\s+/g, ' ')
      .trim();
  }
}
