import { Logger } from '@nestjs/common';
import { ToolDefinition } from '../../llm/llm.types';
import { UnknownToolError } from '../../errors';
import { CourseOutlineTool } from './course-outline.tool';
import { CourseSearchTool } from './course-search.tool';
import { ToolResult } from './tool.interface';

/** Every tool the assistant can offer the model */
export type CourseTool = CourseSearchTool | CourseOutlineTool;

/**
 * Name → tool mapping for one query. Built fresh per query, so nothing a
 * tool returns can leak into another conversation turn.
 */
export class ToolRegistry {
  private readonly logger = new Logger(ToolRegistry.name);
  private readonly tools = new Map<string, CourseTool>();

  register(tool: CourseTool): this {
    const { name } = tool.definition;
    if (this.tools.has(name)) {
      this.logger.debug(`Replacing registered tool "${name}"`);
    }
    this.tools.set(name, tool);
    return this;
  }

  definitions(): ToolDefinition[] {
    return Array.from(this.tools.values(), (tool) => tool.definition);
  }

  async dispatch(
    name: string,
    args: Record<string, unknown>,
  ): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new UnknownToolError(name);
    }
    return tool.execute(args);
  }
}
