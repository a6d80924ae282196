/**
 * Embedding Provider Factory
 * Query embeddings from Ollama or OpenAI; must match the model the chunks
 * were embedded with
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OllamaEmbeddings } from '@langchain/ollama';
import { OpenAIEmbeddings } from '@langchain/openai';
import type { Embeddings } from '@langchain/core/embeddings';
import { EMBEDDING_PROVIDERS, type EmbeddingProvider } from './types';

@Injectable()
export class EmbeddingProviderFactory {
  private readonly logger = new Logger(EmbeddingProviderFactory.name);

  constructor(private readonly configService: ConfigService) {}

  /**
   * Create embedding model based on configuration
   */
  createEmbeddingModel(): Embeddings {
    const provider = this.getProvider();
    const model = this.getModel(provider);

    this.logger.log(`Creating embedding model: ${provider}/${model}`);

    switch (provider) {
      case 'ollama':
        return this.createOllamaEmbeddings(model);
      case 'openai':
        return this.createOpenAIEmbeddings(model);
    }
  }

  /**
   * Get provider from config (default: ollama)
   */
  getProvider(): EmbeddingProvider {
    const configured = this.configService.get<string>(
      'EMBEDDING_PROVIDER',
      'ollama',
    );
    const provider = EMBEDDING_PROVIDERS.find(
      (candidate) => candidate === configured,
    );

    if (!provider) {
      this.logger.warn(
        `Invalid embedding provider: ${configured}, defaulting to ollama`,
      );
      return 'ollama';
    }

    return provider;
  }

  /**
   * Get model based on provider
   */
  private getModel(provider: EmbeddingProvider): string {
    const defaultModels: Record<EmbeddingProvider, string> = {
      ollama: 'bge-m3:567m',
      openai: 'text-embedding-3-small',
    };

    // Provider-specific env vars
    const envVars: Record<EmbeddingProvider, string> = {
      ollama: 'OLLAMA_EMBEDDING_MODEL',
      openai: 'OPENAI_EMBEDDING_MODEL',
    };

    return this.configService.get<string>(
      envVars[provider],
      defaultModels[provider],
    );
  }

  private createOllamaEmbeddings(model: string): OllamaEmbeddings {
    const baseUrl = this.configService.get<string>(
      'OLLAMA_BASE_URL',
      'http://localhost:11434',
    );

    return new OllamaEmbeddings({
      model,
      baseUrl,
    });
  }

  private createOpenAIEmbeddings(model: string): OpenAIEmbeddings {
    const apiKey = this.configService.get<string>('OPENAI_API_KEY');

    if (!apiKey) {
      throw new Error('OPENAI_API_KEY is required for OpenAI embeddings');
    }

    return new OpenAIEmbeddings({
      model,
      openAIApiKey: apiKey,
    });
  }
}
