import type { AssistantClient } from './AssistantClient.js';
import type {
  AskAiRequest,
  AssistantResponse,
  CheckCodeRequest,
  ExplainSyntaxRequest,
} from './types.js';
import { sanitizeText } from '../utils/sanitizeText.js';

const CHECK_DESCRIPTIONS: Readonly<Record<string, string>> = {
  syntax: 'синтаксические ошибки',
  logic: 'логические ошибки и потенциальные проблемы',
  performance: 'проблемы производительности и оптимизации',
};
const DEFAULT_CHECK_DESCRIPTION = 'ошибки';

/**
 * Prompts for the assistant endpoints
 */
export class AssistantService {
  constructor(private client: AssistantClient) {}

  async askAi(request: AskAiRequest, signal?: AbortSignal): Promise<AssistantResponse> {
    if (!request.question.trim()) {
      return { result: '', error: 'Вопрос не может быть пустым' };
    }

    const conversationId = await this.client.getOrCreateConversation(
      request.create_new_session,
      request.programming_language || undefined,
      signal
    );
    return this.ask(conversationId, request.question, signal);
  }

  async explainSyntax(request: ExplainSyntaxRequest, signal?: AbortSignal): Promise<AssistantResponse> {
    if (!request.syntax_element.trim()) {
      return { result: '', error: 'Элемент синтаксиса не может быть пустым' };
    }

    let question = `Объясни синтаксис и использование: ${request.syntax_element}`;
    if (request.context) {
      question += ` в контексте: ${request.context}`;
    }

    const conversationId = await this.client.getOrCreateConversation(false, undefined, signal);
    return this.ask(conversationId, question, signal);
  }

  async checkCode(request: CheckCodeRequest, signal?: AbortSignal): Promise<AssistantResponse> {
    if (!request.code.trim()) {
      return { result: '', error: 'Код для проверки не может быть пустым' };
    }

    const checkType = request.check_type.toLowerCase();
    const description = Object.hasOwn(CHECK_DESCRIPTIONS, checkType)
      ? CHECK_DESCRIPTIONS[checkType]
      : DEFAULT_CHECK_DESCRIPTION;
    const question = `Проверь этот код 1С на ${description} и дай рекомендации:\n\n\`\`\`1c\n${request.code}\n\`\`\``;

    const conversationId = await this.client.getOrCreateConversation(false, undefined, signal);
    return this.ask(conversationId, question, signal);
  }

  private async ask(conversationId: string, question: string, signal?: AbortSignal): Promise<AssistantResponse> {
    const answer = await this.client.sendMessage(conversationId, question, signal);
    return { result: sanitizeText(answer), conversationId };
  }
}
