import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';
import { errorMessage } from '../../common/utils/error.util';
import { EmbeddingService } from '../vector-store/types/vector-store.types';

export type ChatMessageParam = OpenAI.Chat.Completions.ChatCompletionMessageParam;
export type ChatTool = OpenAI.Chat.Completions.ChatCompletionTool;
export type ChatCompletion = OpenAI.Chat.Completions.ChatCompletion;

export interface ChatCompletionRequest {
    messages: ChatMessageParam[];
    tools?: ChatTool[];
    /** Defaults to 'auto' whenever tools are given */
    toolChoice?: 'auto' | 'none';
}

/**
 * OpenAI Service - Native OpenAI SDK Integration
 */
@Injectable()
export class OpenAIService implements EmbeddingService {
    private readonly logger = new Logger(OpenAIService.name);
    private readonly client: OpenAI;
    private readonly embeddingModel: string;
    private readonly chatModel: string;
    private readonly temperature: number;
    private readonly maxTokens: number;
    readonly dimensions: number;

    constructor(private readonly configService: ConfigService) {
        const apiKey = this.configService.get<string>('openai.apiKey');
        if (!apiKey) {
            throw new Error('OPENAI_API_KEY environment variable is not set');
        }

        this.embeddingModel = this.configService.get<string>('openai.embeddingModel') ?? 'text-embedding-3-small';
        this.chatModel = this.configService.get<string>('openai.chatModel') ?? 'gpt-4o-mini';
        this.temperature = this.configService.get<number>('openai.temperature') ?? 0;
        this.maxTokens = this.configService.get<number>('openai.maxTokens') ?? 800;
        this.dimensions = this.configService.get<number>('rag.embeddingDim') ?? 1536;

        this.client = new OpenAI({
            apiKey,
            baseURL: this.configService.get<string>('openai.baseUrl') ?? 'https://api.openai.com/v1',
        });

        this.logger.log(`✅ OpenAI client initialized`);
        this.logger.log(`📊 Embedding model: ${this.embeddingModel}`);
        this.logger.log(`💬 Chat model: ${this.chatModel}`);
    }

    /**
     * Generate embeddings for multiple texts
     */
    async embed(texts: string[]): Promise<number[][]> {
        if (texts.length === 0) {
            return [];
        }

        try {
            this.logger.debug(`🔄 Generating embeddings for ${texts.length} texts`);

            const response = await this.client.embeddings.create({
                model: this.embeddingModel,
                input: texts,
                dimensions: this.dimensions,
                encoding_format: 'float',
            });

            const embeddings = response.data
                .sort((a, b) => a.index - b.index)
                .map((item) => item.embedding);

            this.logger.debug(`✅ Generated ${embeddings.length} embeddings`);
            return embeddings;
        } catch (error) {
            this.logger.error(`❌ Failed to generate embeddings: ${errorMessage(error)}`);
            throw error;
        }
    }

    /**
     * Run one chat completion with the configured model and sampling settings
     */
    async createChatCompletion(request: ChatCompletionRequest): Promise<ChatCompletion> {
        try {
            this.logger.debug(`💬 Generating chat response (${request.messages.length} messages)`);

            const response = await this.client.chat.completions.create({
                model: this.chatModel,
                messages: request.messages,
                temperature: this.temperature,
                max_tokens: this.maxTokens,
                ...(request.tools && request.tools.length > 0
                    ? { tools: request.tools, tool_choice: request.toolChoice ?? 'auto' }
                    : {}),
            });

            this.logger.debug(`📊 Tokens used: ${response.usage?.total_tokens ?? 0}`);
            return response;
        } catch (error) {
            this.logger.error(`❌ Failed to generate chat response: ${errorMessage(error)}`);
            throw error;
        }
    }
}
