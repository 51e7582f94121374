import { messageChunkSchema } from './types.js';
import { createLogger } from '../logger/index.js';

const logger = createLogger('AssistantStream');

const DATA_PREFIX = 'data: ';

/**
 * Split a byte stream into UTF-8 text lines
 */
export async function* readLines(stream: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder('utf-8');
  let buffer = '';
  let done = false;

  try {
    while (true) {
      const chunk = await reader.read();
      if (chunk.done) {
        done = true;
        break;
      }
      buffer += decoder.decode(chunk.value, { stream: true });

      let newline = buffer.indexOf('\n');
      while (newline !== -1) {
        yield buffer.slice(0, newline).replace(/\r$/, '');
        buffer = buffer.slice(newline + 1);
        newline = buffer.indexOf('\n');
      }
    }

    buffer += decoder.decode();
    if (buffer !== '') {
      yield buffer.replace(/\r$/, '');
    }
  } finally {
    if (!done) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

/**
 * Extract the assistant's answer from the message event stream
 *
 * Every assistant chunk carries the full text so far, so the last one wins.
 * Reading stops at the chunk marked finished. Lines that are not JSON
 * events are skipped.
 */
export async function parseAssistantAnswer(lines: AsyncIterable<string>): Promise<string> {
  let answer = '';

  for await (const line of lines) {
    if (!line.startsWith(DATA_PREFIX)) {
      continue;
    }

    let data: unknown;
    try {
      data = JSON.parse(line.slice(DATA_PREFIX.length));
    } catch {
      continue;
    }

    const parsed = messageChunkSchema.safeParse(data);
    if (!parsed.success) {
      logger.warn({ issues: parsed.error.issues.length }, 'Skipping malformed assistant stream chunk');
      continue;
    }

    const chunk = parsed.data;
    const text = chunk.content?.text;
    if (chunk.role === 'assistant' && typeof text === 'string' && text !== '') {
      answer = text;
    }
    if (chunk.finished) {
      break;
    }
  }

  return answer.trim();
}
