import { Injectable, Logger } from '@nestjs/common';
import { Tool, ToolArguments, ToolDefinition, ToolResult } from './tool.interface';

/**
 * Registry of the tools offered to the chat model
 */
@Injectable()
export class ToolManager {
    private readonly logger = new Logger(ToolManager.name);
    private readonly tools = new Map<string, Tool>();

    registerTool(tool: Tool): void {
        const { name } = tool.getToolDefinition();
        if (!name) {
            throw new Error("Tool must have a 'name' in its definition");
        }
        this.tools.set(name, tool);
        this.logger.debug(`🔧 Registered tool: ${name}`);
    }

    hasTool(name: string): boolean {
        return this.tools.has(name);
    }

    getToolDefinitions(): ToolDefinition[] {
        return [...this.tools.values()].map((tool) => tool.getToolDefinition());
    }

    async executeTool(name: string, args: ToolArguments): Promise<ToolResult> {
        const tool = this.tools.get(name);
        if (!tool) {
            return { content: `Tool '${name}' not found` };
        }
        this.logger.debug(`🔧 Executing ${name} ${JSON.stringify(args)}`);
        return tool.execute(args);
    }
}
