import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { errorMessage } from '../../../common/utils/error.util';
import { ChatMessageParam, ChatTool, OpenAIService } from '../../openai/openai.service';
import { ToolManager } from '../tools/tool-manager';
import { ToolArguments, ToolDefinition } from '../tools/tool.interface';

export const SYSTEM_PROMPT = `You are an AI assistant specialized in course materials and educational content, with tools for searching course content and reading course outlines.

Tool usage:
- Use the content search tool only for questions about specific course content or detailed educational materials
- Use the outline tool for questions about a course's structure, lesson list, link or instructor
- At most 2 sequential tool rounds per query: you may search, look at the results, then search again if needed
- Synthesize tool results into accurate, fact-based answers
- If a search yields no results, say so plainly without offering alternatives

Answering:
- General knowledge questions: answer from what you already know, without searching
- Course-specific questions: search first, then answer
- No meta-commentary: give the answer only, without describing your reasoning, the searches you ran or the type of question, and never write "based on the search results"

Every answer must be brief and focused, educational, clear, and supported by an example when one helps.
Provide only the direct answer to what was asked.`;

export const TOOL_FAILURE_ANSWER =
    'I encountered an issue while searching for additional information. Please try rephrasing your question.';

export const MAX_TOOL_ROUNDS = 2;

export interface GenerateResponseRequest {
    query: string;
    conversationHistory?: string | null;
    tools?: ToolDefinition[];
    toolManager?: ToolManager;
}

export interface GeneratedResponse {
    answer: string;
    /** Sources of the latest tool result that cited any, scoped to this call */
    sources: string[];
}

const argumentsSchema = z.record(z.unknown());

function parseToolArguments(raw: string): ToolArguments {
    try {
        const parsed = argumentsSchema.safeParse(JSON.parse(raw));
        return parsed.success ? parsed.data : {};
    } catch {
        return {};
    }
}

function toChatTool(definition: ToolDefinition): ChatTool {
    return {
        type: 'function',
        function: {
            name: definition.name,
            description: definition.description,
            parameters: definition.parameters,
        },
    };
}

/**
 * AI Generator Service - chat completions with tool calling
 */
@Injectable()
export class AiGeneratorService {
    private readonly logger = new Logger(AiGeneratorService.name);

    constructor(private readonly openaiService: OpenAIService) { }

    /**
     * Answer a query, running up to two rounds of tool calls before the final answer
     */
    async generateResponse(request: GenerateResponseRequest): Promise<GeneratedResponse> {
        const { query, conversationHistory, toolManager } = request;

        const system = conversationHistory
            ? `${SYSTEM_PROMPT}\n\nPrevious conversation:\n${conversationHistory}`
            : SYSTEM_PROMPT;

        const messages: ChatMessageParam[] = [
            { role: 'system', content: system },
            { role: 'user', content: query },
        ];
        const tools = request.tools?.map(toChatTool);

        let sources: string[] = [];
        let response = await this.openaiService.createChatCompletion({ messages, tools });

        for (let round = 0; ; round++) {
            const choice = response.choices[0];
            const toolCalls = choice?.message.tool_calls ?? [];

            if (!choice || choice.finish_reason !== 'tool_calls' || !toolManager || toolCalls.length === 0) {
                return { answer: choice?.message.content ?? '', sources };
            }

            messages.push({ role: 'assistant', content: choice.message.content, tool_calls: toolCalls });

            try {
                for (const call of toolCalls) {
                    const result = await toolManager.executeTool(
                        call.function.name,
                        parseToolArguments(call.function.arguments),
                    );
                    if (result.sources) {
                        sources = result.sources;
                    }
                    messages.push({ role: 'tool', tool_call_id: call.id, content: result.content });
                }
            } catch (error) {
                if (round === 0) {
                    throw error;
                }
                this.logger.warn(`⚠️ Tool execution failed in round ${round + 1}: ${errorMessage(error)}`);
                return { answer: TOOL_FAILURE_ANSWER, sources };
            }

            this.logger.debug(`🔧 Tool round ${round + 1}: ${toolCalls.length} call(s)`);

            if (round + 1 >= MAX_TOOL_ROUNDS) {
                // Tools stay declared so the tool messages remain valid, but may not be called
                const final = await this.openaiService.createChatCompletion({ messages, tools, toolChoice: 'none' });
                return { answer: final.choices[0]?.message.content ?? '', sources };
            }

            response = await this.openaiService.createChatCompletion({ messages, tools });
        }
    }
}
