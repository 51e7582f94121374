import { afterEach, describe, it, expect, vi } from 'vitest';
import { AssistantClient } from '../../src/assistant/AssistantClient.js';
import { AssistantService } from '../../src/assistant/AssistantService.js';
import type { AssistantConfig } from '../../src/config/config.js';
import { jsonResponse, stubFetch, textResponse } from '../helpers/fetchStub.js';
import { sseBody } from '../helpers/streams.js';

const config: AssistantConfig = {
  baseUrl: 'https://assistant.test',
  token: 'test-token',
  timeoutMs: 1000,
  uiLanguage: 'russian',
  programmingLanguage: '',
  scriptLanguage: '',
  maxActiveConversations: 5,
  conversationTtlSeconds: 60,
};

function setup(answer: string) {
  const instructions: string[] = [];
  const fetchMock = stubFetch((url, init) => {
    if (url.endsWith('/conversations/')) {
      return jsonResponse({ uuid: 'conv-1' });
    }
    const body: unknown = JSON.parse(String(init.body));
    if (typeof body === 'object' && body !== null && 'tool_content' in body) {
      const content = body.tool_content;
      if (typeof content === 'object' && content !== null && 'instruction' in content) {
        instructions.push(String(content.instruction));
      }
    }
    return textResponse(sseBody([{ role: 'assistant', content: { text: answer }, finished: true }]), 200);
  });
  return { service: new AssistantService(new AssistantClient(config)), instructions, fetchMock };
}

describe('AssistantService', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('asks a question and cleans the answer', async () => {
    const { service, instructions } = setup('Ответ\u200B\u0007 готов');

    const response = await service.askAi({
      question: 'Как создать справочник?',
      programming_language: '',
      create_new_session: false,
    });

    expect(response).toEqual({ result: 'Ответ готов', conversationId: 'conv-1' });
    expect(instructions).toEqual(['Как создать справочник?']);
  });

  it('refuses an empty question without calling the service', async () => {
    const { service, fetchMock } = setup('unused');

    const response = await service.askAi({ question: '   ', programming_language: '', create_new_session: false });

    expect(response).toEqual({ result: '', error: 'Вопрос не может быть пустым' });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('explains a syntax element in context', async () => {
    const { service, instructions } = setup('Пояснение');

    await service.explainSyntax({ syntax_element: 'Запрос', context: 'отчеты' });

    expect(instructions).toEqual(['Объясни синтаксис и использование: Запрос в контексте: отчеты']);
  });

  it('builds a code check prompt for the requested check', async () => {
    const { service, instructions } = setup('Ошибок нет');

    const response = await service.checkCode({ code: 'Сообщить(1);', check_type: 'Logic' });

    expect(response.result).toBe('Ошибок нет');
    expect(instructions).toEqual([
      'Проверь этот код 1С на логические ошибки и потенциальные проблемы и дай рекомендации:\n\n```1c\nСообщить(1);\n```',
    ]);
  });

  it('falls back to a general check for unknown check types', async () => {
    const { service, instructions } = setup('ok');

    await service.checkCode({ code: 'А = 1;', check_type: 'style' });

    expect(instructions[0]).toBe('Проверь этот код 1С на ошибки и дай рекомендации:\n\n```1c\nА = 1;\n```');
  });

  it('refuses empty code and syntax elements', async () => {
    const { service } = setup('unused');

    expect(await service.checkCode({ code: '', check_type: 'syntax' }))
      .toEqual({ result: '', error: 'Код для проверки не может быть пустым' });
    expect(await service.explainSyntax({ syntax_element: ' ', context: '' }))
      .toEqual({ result: '', error: 'Элемент синтаксиса не может быть пустым' });
  });
});
