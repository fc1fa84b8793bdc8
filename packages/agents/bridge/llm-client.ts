// Language model bridge backed by the Anthropic Messages API

import Anthropic from '@anthropic-ai/sdk';
import type { ChatMessage, LanguageModel } from '../types/collaborators.js';

/** The part of a Messages API reply this bridge reads */
export interface MessagesReply {
  content: Array<{ type: string; text?: string }>;
}

/** The slice of the SDK client this bridge uses */
export interface MessagesClient {
  messages: {
    create(params: Anthropic.MessageCreateParamsNonStreaming): Promise<MessagesReply>;
  };
}

export interface AnthropicModelOptions {
  apiKey?: string;
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
  client?: MessagesClient;
}

type Turn = { role: 'user' | 'assistant'; content: string };

function isTurn(message: ChatMessage): message is ChatMessage & Turn {
  return message.role !== 'system';
}

/**
 * System messages become the `system` parameter; consecutive same-role
 * turns are merged so roles alternate.
 */
export function toAnthropicRequest(messages: ChatMessage[]): { system: string; turns: Turn[] } {
  const system = messages
    .filter(m => m.role === 'system')
    .map(m => m.content)
    .join('\n\n');

  const turns: Turn[] = [];
  for (const message of messages.filter(isTurn)) {
    const last = turns[turns.length - 1];
    if (last && last.role === message.role) {
      last.content = `${last.content}\n\n${message.content}`;
    } else {
      turns.push({ role: message.role, content: message.content });
    }
  }
  return { system, turns };
}

export class AnthropicLanguageModel implements LanguageModel {
  private readonly client: MessagesClient;

  constructor(private readonly options: AnthropicModelOptions) {
    this.client = options.client ?? new Anthropic({
      apiKey: options.apiKey,
      timeout: options.timeoutMs,
      maxRetries: 2,
    });
  }

  async invoke(messages: ChatMessage[]): Promise<string> {
    const { system, turns } = toAnthropicRequest(messages);
    if (turns.length === 0) {
      throw new Error('Language model called without any user message');
    }

    const response = await this.client.messages.create({
      model: this.options.model,
      max_tokens: this.options.maxTokens,
      temperature: this.options.temperature,
      ...(system ? { system } : {}),
      messages: turns,
    });

    return response.content
      .flatMap(block => (block.type === 'text' && block.text !== undefined ? [block.text] : []))
      .join('')
      .trim();
  }
}
