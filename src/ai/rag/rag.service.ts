import { Injectable, Logger } from '@nestjs/common';
import { SourceCitation } from '../models/course.model';
import {
  CourseAnalytics,
  CourseSearchService,
} from './services/course-search.service';
import { GenerationService } from './services/generation.service';
import { SessionStoreService } from './services/session-store.service';
import { CourseOutlineTool } from './tools/course-outline.tool';
import { CourseSearchTool } from './tools/course-search.tool';
import { ToolRegistry } from './tools/tool-registry';

export interface RagAnswer {
  answer: string;
  sources: SourceCitation[];
  sessionId: string;
}

@Injectable()
export class RagService {
  private readonly logger = new Logger(RagService.name);

  constructor(
    private readonly sessionStore: SessionStoreService,
    private readonly courseSearch: CourseSearchService,
    private readonly generationService: GenerationService,
  ) {}

  /**
   * Answer one question, with the session's recent turns as context.
   * Questions for the same session are answered one at a time, in the
   * order they arrive.
   */
  async answer(query: string, sessionId?: string): Promise<RagAnswer> {
    const id = sessionId || this.sessionStore.createSession();
    const startTime = Date.now();

    return this.sessionStore.runExclusive(id, async () => {
      this.logger.log(`💬 Query for ${id}: "${query.substring(0, 80)}"`);

      const history = this.sessionStore.getHistory(id);
      const tools = this.createToolRegistry();

      const { answer, sources } = await this.generationService.generate({
        query,
        history,
        tools,
      });

      this.sessionStore.addExchange(id, query, answer);

      this.logger.log(
        `✅ Answered in ${Date.now() - startTime}ms with ${sources.length} source(s)`,
      );
      return { answer, sources, sessionId: id };
    });
  }

  clearSession(sessionId: string): void {
    this.sessionStore.clearSession(sessionId);
  }

  getCourseAnalytics(): Promise<CourseAnalytics> {
    return this.courseSearch.getCourseAnalytics();
  }

  private createToolRegistry(): ToolRegistry {
    return new ToolRegistry()
      .register(new CourseSearchTool(this.courseSearch))
      .register(new CourseOutlineTool(this.courseSearch));
  }
}
