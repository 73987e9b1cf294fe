import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { of } from 'rxjs';
import { OllamaService, parseToolArguments } from './ollama.service';
import { ChatRequest, ToolDefinition } from './llm.types';
import { TestConfigOverrides, testConfig } from '../../testing/test-config';

const SEARCH_TOOL: ToolDefinition = {
  name: 'search_course_content',
  description: 'Search course materials',
  parameters: {
    type: 'object',
    properties: { query: { type: 'string', description: 'What to find' } },
    required: ['query'],
  },
};

const INITIAL_REQUEST: ChatRequest = {
  system: 'You are helpful.',
  messages: [{ role: 'user', content: 'what is foo' }],
  tools: [SEARCH_TOOL],
  toolChoice: 'auto',
  temperature: 0,
  maxTokens: 800,
};

describe('OllamaService', () => {
  let service: OllamaService;
  const http = { get: jest.fn(), post: jest.fn() };

  async function createService(config: TestConfigOverrides = {}) {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        OllamaService,
        { provide: HttpService, useValue: http },
        { provide: ConfigService, useValue: testConfig(config) },
      ],
    }).compile();

    return module.get<OllamaService>(OllamaService);
  }

  beforeEach(() => {
    jest.resetAllMocks();
  });

  describe('chat with Ollama', () => {
    beforeEach(async () => {
      service = await createService();
    });

    it('should send tools and map tool calls', async () => {
      http.post.mockReturnValue(
        of({
          data: {
            model: 'test-chat',
            done_reason: 'stop',
            message: {
              role: 'assistant',
              content: '',
              tool_calls: [
                {
                  function: {
                    name: 'search_course_content',
                    arguments: { query: 'foo' },
                  },
                },
              ],
            },
          },
        }),
      );

      const response = await service.chat(INITIAL_REQUEST);

      expect(response).toEqual({
        stopReason: 'tool_use',
        text: '',
        toolCalls: [
          {
            id: 'call_0',
            name: 'search_course_content',
            arguments: { query: 'foo' },
          },
        ],
      });
      expect(http.post).toHaveBeenCalledWith(
        'http://localhost:11434/api/chat',
        {
          model: 'test-chat',
          messages: [
            { role: 'system', content: 'You are helpful.' },
            { role: 'user', content: 'what is foo' },
          ],
          tools: [{ type: 'function', function: SEARCH_TOOL }],
          stream: false,
          options: { temperature: 0, num_predict: 800 },
        },
        { timeout: 1000 },
      );
    });

    it('should send tool results without tool definitions', async () => {
      http.post.mockReturnValue(
        of({
          data: {
            model: 'test-chat',
            done_reason: 'length',
            message: { role: 'assistant', content: 'Foo is' },
          },
        }),
      );

      const response = await service.chat({
        system: 'You are helpful.',
        messages: [
          { role: 'user', content: 'what is foo' },
          {
            role: 'assistant',
            content: '',
            toolCalls: [
              { id: 'call_0', name: 'search_course_content', arguments: {} },
            ],
          },
          {
            role: 'tool',
            toolCallId: 'call_0',
            name: 'search_course_content',
            content: 'foo bar',
          },
        ],
        temperature: 0,
        maxTokens: 800,
      });

      expect(response.stopReason).toBe('max_tokens');
      const [, body] = http.post.mock.calls[0];
      expect(body.tools).toBeUndefined();
      expect(body.messages[3]).toEqual({
        role: 'tool',
        content: 'foo bar',
        tool_name: 'search_course_content',
      });
    });
  });

  describe('chat with OpenAI', () => {
    beforeEach(async () => {
      service = await createService({ llm: { useOpenAI: true } });
    });

    it('should request a single tool call and parse its arguments', async () => {
      http.post.mockReturnValue(
        of({
          data: {
            choices: [
              {
                finish_reason: 'tool_calls',
                message: {
                  content: null,
                  tool_calls: [
                    {
                      id: 'call_abc',
                      type: 'function',
                      function: {
                        name: 'search_course_content',
                        arguments: '{"query":"foo","lesson_number":2}',
                      },
                    },
                  ],
                },
              },
            ],
          },
        }),
      );

      const response = await service.chat(INITIAL_REQUEST);

      expect(response).toEqual({
        stopReason: 'tool_use',
        text: '',
        toolCalls: [
          {
            id: 'call_abc',
            name: 'search_course_content',
            arguments: { query: 'foo', lesson_number: 2 },
          },
        ],
      });
      const [url, body, options] = http.post.mock.calls[0];
      expect(url).toBe('http://localhost:9999/v1/chat/completions');
      expect(body).toEqual(
        expect.objectContaining({
          tool_choice: 'auto',
          parallel_tool_calls: false,
        }),
      );
      expect(options.headers.Authorization).toBe('Bearer test-secret');
    });

    it('should leave tool options out of the follow-up call', async () => {
      http.post.mockReturnValue(
        of({
          data: {
            choices: [
              { finish_reason: 'stop', message: { content: 'Foo is bar.' } },
            ],
          },
        }),
      );

      const response = await service.chat({
        ...INITIAL_REQUEST,
        tools: undefined,
        toolChoice: undefined,
      });

      expect(response).toEqual({
        stopReason: 'end_turn',
        text: 'Foo is bar.',
        toolCalls: [],
      });
      const [, body] = http.post.mock.calls[0];
      expect(body).not.toHaveProperty('tools');
      expect(body).not.toHaveProperty('tool_choice');
    });
  });

  describe('parseToolArguments', () => {
    it('should parse a JSON object', () => {
      expect(parseToolArguments('{"query":"foo"}')).toEqual({ query: 'foo' });
    });

    it('should return an empty object for anything else', () => {
      expect(parseToolArguments('not json')).toEqual({});
      expect(parseToolArguments('[1, 2]')).toEqual({});
    });
  });
});
