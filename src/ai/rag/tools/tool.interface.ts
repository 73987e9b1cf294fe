import { ToolDefinition } from '../../llm/llm.types';
import { SourceCitation } from '../../models/course.model';

export interface ToolResult {
  /** Text handed back to the model as the tool's output; never empty */
  content: string;
  /** Citations for the answer built from this output */
  sources: SourceCitation[];
  isError: boolean;
}

export interface Tool {
  readonly definition: ToolDefinition;
  execute(args: Record<string, unknown>): Promise<ToolResult>;
}
