/**
 * Function-calling tool contracts
 */

export type ToolArguments = Record<string, unknown>;

export interface ToolDefinition {
    name: string;
    description: string;
    /** JSON schema of the arguments object */
    parameters: Record<string, unknown>;
}

export interface ToolResult {
    /** Text handed back to the model */
    content: string;
    /** Sources behind the content, shown with the answer. Absent for tools that cite nothing */
    sources?: string[];
}

export interface Tool {
    getToolDefinition(): ToolDefinition;
    execute(args: ToolArguments): Promise<ToolResult>;
}
