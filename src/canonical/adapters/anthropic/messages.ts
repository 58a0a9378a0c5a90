import type { ChatRequest, Message, SystemPrompt, TextBlock } from '../../types/index.js';
import { ConversionError } from '../../../shared/errors/index.js';

/**
 * The Messages API has no system role inside `messages`; system-role messages
 * are appended to the top-level system prompt in order.
 */
export function foldSystemMessages(request: ChatRequest): ChatRequest {
  if (!request.messages.some(m => m.role === 'system')) return request;

  const extra: TextBlock[] = [];
  const messages: Message[] = [];

  request.messages.forEach((message, i) => {
    if (message.role !== 'system') {
      messages.push(message);
      return;
    }
    message.content.forEach((block, j) => {
      if (block.type !== 'text') {
        throw new ConversionError(
          'UnsupportedConstruct',
          `System message content must be text, got ${block.type}`,
          { path: `messages[${i}].content[${j}]` }
        );
      }
      extra.push(block);
    });
  });

  return { ...request, system: appendSystem(request.system, extra), messages };
}

function appendSystem(system: SystemPrompt | undefined, extra: TextBlock[]): SystemPrompt {
  if (Array.isArray(system)) return [...system, ...extra];
  const texts = extra.map(block => block.text);
  return (system === undefined ? texts : [system, ...texts]).join('\n\n');
}
