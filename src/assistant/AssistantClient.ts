import type { AssistantConfig } from '../config/config.js';
import {
  AuthenticationError,
  UpstreamProtocolError,
  UpstreamUnavailableError,
} from '../types/errors.js';
import { CallScope } from '../gateway/core/CallScope.js';
import { ConversationStore } from './ConversationStore.js';
import { conversationCreatedSchema } from './types.js';
import { parseAssistantAnswer, readLines } from './sseParser.js';
import { createLogger } from '../logger/index.js';

const CONVERSATIONS_PATH = '/chat_api/v1/conversations/';

/**
 * Client for the 1C:AI assistant chat API
 *
 * Conversations are created lazily and reused; each message answer arrives
 * as an event stream.
 */
export class AssistantClient {
  private logger = createLogger('AssistantClient');
  private closed = false;
  readonly conversations: ConversationStore;

  constructor(private config: AssistantConfig) {
    this.conversations = new ConversationStore({
      ttlSeconds: config.conversationTtlSeconds,
      maxActive: config.maxActiveConversations,
    });
  }

  private get baseHeaders(): Record<string, string> {
    return {
      Accept: '*/*',
      'Accept-Charset': 'utf-8',
      'Accept-Language': 'ru-ru,en-us;q=0.8,en;q=0.7',
      Authorization: this.config.token,
      'Content-Type': 'application/json; charset=utf-8',
      Origin: this.config.baseUrl,
      Referer: `${this.config.baseUrl}/chat/`,
    };
  }

  /**
   * Open a new conversation
   *
   * @returns Conversation id
   */
  async createConversation(
    programmingLanguage?: string,
    scriptLanguage?: string,
    signal?: AbortSignal
  ): Promise<string> {
    const body = {
      tool_name: 'custom',
      ui_language: this.config.uiLanguage,
      programming_language: programmingLanguage || this.config.programmingLanguage,
      script_language: scriptLanguage || this.config.scriptLanguage,
    };

    const raw = await this.post(`${this.config.baseUrl}${CONVERSATIONS_PATH}`, body, { 'Session-Id': '' }, signal,
      async (response) => response.text());

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new UpstreamProtocolError('Assistant service returned invalid JSON', { diagnostic: raw, cause: error });
    }
    const parsed = conversationCreatedSchema.safeParse(data);
    if (!parsed.success) {
      throw new UpstreamProtocolError('Assistant service returned no conversation id', { diagnostic: raw });
    }

    const id = parsed.data.uuid;
    this.conversations.add(id);
    this.logger.info({ conversationId: id }, 'Assistant conversation created');
    return id;
  }

  /**
   * Send a message and wait for the complete answer
   */
  async sendMessage(conversationId: string, message: string, signal?: AbortSignal): Promise<string> {
    this.conversations.markUsed(conversationId);

    const url = `${this.config.baseUrl}${CONVERSATIONS_PATH}${encodeURIComponent(conversationId)}/messages`;
    const body = { parent_uuid: null, tool_content: { instruction: message } };

    const answer = await this.post(url, body, { Accept: 'text/event-stream' }, signal, async (response) => {
      if (!response.body) {
        throw new UpstreamProtocolError('Assistant service returned an empty stream');
      }
      return parseAssistantAnswer(readLines(response.body));
    });

    this.logger.info({ conversationId, length: answer.length }, 'Assistant answer received');
    return answer;
  }

  /**
   * Reuse the most recently used conversation, or open one
   */
  async getOrCreateConversation(createNew = false, programmingLanguage?: string, signal?: AbortSignal): Promise<string> {
    this.conversations.sweepExpired();

    if (this.conversations.isFull) {
      this.conversations.evictLeastRecentlyUsed();
    }

    const recent = createNew ? undefined : this.conversations.mostRecentlyUsed();
    if (recent) {
      return recent.id;
    }
    return this.createConversation(programmingLanguage, undefined, signal);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  close(): void {
    this.closed = true;
    this.conversations.clear();
  }

  /**
   * POST JSON and hand a 200 response to `read`, all under the client deadline
   */
  private async post<T>(
    url: string,
    body: unknown,
    headers: Record<string, string>,
    signal: AbortSignal | undefined,
    read: (response: Response) => Promise<T>
  ): Promise<T> {
    if (this.closed) {
      throw new UpstreamUnavailableError('Assistant client is closed');
    }

    const scope = new CallScope(this.config.timeoutMs, signal, 'Assistant request');
    try {
      let response: Response;
      try {
        response = await scope.race(fetch(url, {
          method: 'POST',
          headers: { ...this.baseHeaders, ...headers },
          body: JSON.stringify(body),
          signal: scope.signal,
        }));
      } catch (error) {
        if (scope.isAborted) throw error;
        throw new UpstreamUnavailableError('Assistant service is unreachable', {
          diagnostic: error instanceof Error ? error.message : String(error),
          cause: error,
        });
      }

      if (response.status !== 200) {
        const raw = await scope.race(response.text());
        if (response.status === 401 || response.status === 403) {
          throw new AuthenticationError('Assistant service rejected the token', { diagnostic: raw });
        }
        throw new UpstreamProtocolError(`Assistant service answered HTTP ${response.status}`, { diagnostic: raw });
      }

      return await scope.race(read(response));
    } catch (error) {
      throw scope.translate(error);
    } finally {
      scope.dispose();
    }
  }
}
