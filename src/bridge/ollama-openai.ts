/**
 * Ollama ⇄ OpenAI dialect bridge
 *
 * Lets an Ollama-native caller use /api/chat and /api/generate against an
 * OpenAI-compatible provider. Requests become chat completions; responses,
 * buffered or streamed, come back in Ollama's shape.
 *
 * @packageDocumentation
 */

import { RoutingError } from '../errors.js';
import { isPlainObject, parseJsonObject } from '../json.js';
import type { BridgeEndpoint } from '../types.js';

/** Path the bridged request is sent to, below the provider base URL */
export const OPENAI_CHAT_PATH = '/v1/chat/completions';

/** Max bytes of an unterminated SSE line. Guards against a runaway upstream. */
const MAX_LINE_BUFFER = 1024 * 1024;

/** Ollama `options` keys that carry over under the same name */
const SHARED_OPTIONS = ['temperature', 'top_p', 'seed', 'stop', 'presence_penalty', 'frequency_penalty'] as const;

interface OpenAIContentPart {
  type: 'text' | 'image_url';
  text?: string;
  image_url?: { url: string };
}

interface OpenAIMessage {
  role: string;
  content: string | OpenAIContentPart[];
  [key: string]: unknown;
}

/** A tool call sent upstream that still waits for its `tool` reply */
interface PendingToolCall {
  id: string;
  name: string;
}

// ============================================================================
// Requests
// ============================================================================

/** Ollama sends bare base64; OpenAI wants a data URL. */
function imageUrl(image: string): string {
  if (image.startsWith('data:')) return image;
  const mime = image.startsWith('/9j/')
    ? 'image/jpeg'
    : image.startsWith('R0lGOD')
      ? 'image/gif'
      : image.startsWith('UklGR')
        ? 'image/webp'
        : 'image/png';
  return `data:${mime};base64,${image}`;
}

function messageContent(source: Record<string, unknown>, where: string): string | OpenAIContentPart[] {
  const content = source['content'] ?? '';
  if (typeof content !== 'string') {
    throw new RoutingError('malformed_request', `${where}.content must be a string`);
  }

  const images = source['images'];
  if (images === undefined || images === null) return content;
  if (!Array.isArray(images) || !images.every((image): image is string => typeof image === 'string')) {
    throw new RoutingError('malformed_request', `${where}.images must be an array of base64 strings`);
  }
  if (images.length === 0) return content;

  const parts: OpenAIContentPart[] = [];
  if (content.length > 0) parts.push({ type: 'text', text: content });
  for (const image of images) {
    parts.push({ type: 'image_url', image_url: { url: imageUrl(image) } });
  }
  return parts;
}

function stringifyArguments(value: unknown, where: string): string {
  if (value === undefined || value === null) return '{}';
  if (typeof value === 'string') return value;
  if (isPlainObject(value)) return JSON.stringify(value);
  throw new RoutingError('malformed_request', `${where}.function.arguments must be an object`);
}

function toOpenAIToolCalls(
  calls: unknown[],
  messageIndex: number,
  pending: PendingToolCall[]
): Record<string, unknown>[] {
  const where = `messages[${messageIndex}]`;
  return calls.map((call: unknown, index) => {
    const fn = isPlainObject(call) ? call['function'] : undefined;
    const name = isPlainObject(fn) ? fn['name'] : undefined;
    if (!isPlainObject(call) || !isPlainObject(fn) || typeof name !== 'string') {
      throw new RoutingError('malformed_request', `${where}.tool_calls[${index}] must name a function`);
    }
    const id = typeof call['id'] === 'string' ? call['id'] : `call_${messageIndex}_${index}`;
    pending.push({ id, name });
    return {
      id,
      type: 'function',
      function: {
        name,
        arguments: stringifyArguments(fn['arguments'], `${where}.tool_calls[${index}]`),
      },
    };
  });
}

/**
 * Find the call a `tool` message answers: by explicit id, then by function
 * name, then the oldest unanswered call.
 */
function takeToolCallId(message: Record<string, unknown>, where: string, pending: PendingToolCall[]): string {
  const explicit = message['tool_call_id'];
  const name = message['tool_name'] ?? message['name'];

  let at = -1;
  if (typeof explicit === 'string') {
    at = pending.findIndex((call) => call.id === explicit);
    if (at === -1) return explicit;
  } else if (typeof name === 'string') {
    at = pending.findIndex((call) => call.name === name);
  }
  if (at === -1) at = pending.length > 0 ? 0 : -1;

  const match = pending[at];
  if (!match) {
    throw new RoutingError('malformed_request', `${where} answers no preceding tool call`);
  }
  pending.splice(at, 1);
  return match.id;
}

function chatMessages(body: Record<string, unknown>): OpenAIMessage[] {
  const messages = body['messages'];
  if (!Array.isArray(messages)) {
    throw new RoutingError('malformed_request', "'messages' must be an array");
  }

  const pending: PendingToolCall[] = [];
  return messages.map((message: unknown, index): OpenAIMessage => {
    const where = `messages[${index}]`;
    if (!isPlainObject(message) || typeof message['role'] !== 'string') {
      throw new RoutingError('malformed_request', `${where} must be an object with a string 'role'`);
    }
    const converted: OpenAIMessage = {
      role: message['role'],
      content: messageContent(message, where),
    };
    if (Array.isArray(message['tool_calls']) && message['tool_calls'].length > 0) {
      converted['tool_calls'] = toOpenAIToolCalls(message['tool_calls'], index, pending);
    }
    if (message['role'] === 'tool') {
      converted['tool_call_id'] = takeToolCallId(message, where, pending);
    }
    return converted;
  });
}

function generateMessages(body: Record<string, unknown>): OpenAIMessage[] {
  const prompt = body['prompt'];
  if (typeof prompt !== 'string') {
    throw new RoutingError('malformed_request', "'prompt' must be a string");
  }

  const messages: OpenAIMessage[] = [];
  const system = body['system'];
  if (typeof system === 'string' && system.length > 0) {
    messages.push({ role: 'system', content: system });
  }
  messages.push({ role: 'user', content: messageContent({ content: prompt, images: body['images'] }, 'body') });
  return messages;
}

/**
 * Build an OpenAI chat completion request from an Ollama chat/generate body.
 * Ollama streams unless told otherwise, so `stream` defaults to true.
 */
export function toOpenAIChatRequest(
  body: Record<string, unknown>,
  endpoint: BridgeEndpoint,
  nativeModel: string
): Record<string, unknown> {
  const request: Record<string, unknown> = {
    model: nativeModel,
    messages: endpoint === 'chat' ? chatMessages(body) : generateMessages(body),
    stream: body['stream'] !== false,
  };

  const options: Record<string, unknown> = isPlainObject(body['options']) ? body['options'] : {};
  for (const key of SHARED_OPTIONS) {
    if (options[key] !== undefined) request[key] = options[key];
  }
  if (options['num_predict'] !== undefined) {
    request['max_tokens'] = options['num_predict'];
  }

  if (body['format'] === 'json') {
    request['response_format'] = { type: 'json_object' };
  }
  if (Array.isArray(body['tools'])) {
    request['tools'] = body['tools'];
  }

  return request;
}

// ============================================================================
// Responses
// ============================================================================

interface Usage {
  promptTokens: number;
  completionTokens: number;
}

function readUsage(value: unknown): Usage | null {
  if (!isPlainObject(value)) return null;
  const prompt = value['prompt_tokens'];
  const completion = value['completion_tokens'];
  return {
    promptTokens: typeof prompt === 'number' ? prompt : 0,
    completionTokens: typeof completion === 'number' ? completion : 0,
  };
}

function firstChoice(payload: Record<string, unknown>): Record<string, unknown> | null {
  const choices = payload['choices'];
  if (!Array.isArray(choices)) return null;
  const first: unknown = choices[0];
  return isPlainObject(first) ? first : null;
}

/** OpenAI sends arguments as JSON text; Ollama clients read an object. */
function parseToolArguments(value: unknown): Record<string, unknown> {
  if (isPlainObject(value)) return value;
  if (value === undefined || value === null || value === '') return {};
  const parsed = typeof value === 'string' ? parseJsonObject(value) : null;
  if (!parsed) {
    throw new Error(`Malformed tool call arguments: ${String(value).slice(0, 200)}`);
  }
  return parsed;
}

function toOllamaToolCall(name: string, args: unknown): Record<string, unknown> {
  return { function: { name, arguments: parseToolArguments(args) } };
}

function fromOpenAIToolCalls(calls: unknown[]): Record<string, unknown>[] {
  const out: Record<string, unknown>[] = [];
  for (const call of calls) {
    const fn = isPlainObject(call) ? call['function'] : undefined;
    if (isPlainObject(fn) && typeof fn['name'] === 'string') {
      out.push(toOllamaToolCall(fn['name'], fn['arguments']));
    }
  }
  return out;
}

function ollamaPayload(
  endpoint: BridgeEndpoint,
  model: string,
  createdAt: Date,
  content: string,
  toolCalls: unknown[] | null
): Record<string, unknown> {
  if (endpoint === 'generate') {
    return { model, created_at: createdAt.toISOString(), response: content };
  }
  const message: Record<string, unknown> = { role: 'assistant', content };
  if (toolCalls) message['tool_calls'] = toolCalls;
  return { model, created_at: createdAt.toISOString(), message };
}

/**
 * Convert a buffered OpenAI chat completion into a single Ollama response.
 */
export function fromOpenAICompletion(
  payload: Record<string, unknown>,
  endpoint: BridgeEndpoint,
  model: string,
  now: Date = new Date()
): Record<string, unknown> {
  const choice = firstChoice(payload);
  const message: Record<string, unknown> = choice && isPlainObject(choice['message']) ? choice['message'] : {};
  const content = typeof message['content'] === 'string' ? message['content'] : '';
  const toolCalls = Array.isArray(message['tool_calls']) ? fromOpenAIToolCalls(message['tool_calls']) : null;
  const finishReason = choice && typeof choice['finish_reason'] === 'string' ? choice['finish_reason'] : 'stop';
  const usage = readUsage(payload['usage']);

  return {
    ...ollamaPayload(endpoint, model, now, content, toolCalls),
    done: true,
    done_reason: finishReason,
    prompt_eval_count: usage?.promptTokens ?? 0,
    eval_count: usage?.completionTokens ?? 0,
  };
}

/** A streamed tool call, assembled from its deltas */
interface ToolCallParts {
  name: string;
  arguments: string;
}

/**
 * Translates an OpenAI SSE stream into Ollama NDJSON, one event at a time.
 *
 * Text may arrive split anywhere; each complete `data:` event that carries
 * content yields exactly one output line, and the stream ends with a single
 * `done: true` line. Tool call deltas are collected by `index` and sent as
 * one line once the choice finishes. Returned lines have no trailing newline.
 */
export class OpenAIStreamTranslator {
  private buffer = '';
  private finished = false;
  private doneReason = 'stop';
  private usage: Usage = { promptTokens: 0, completionTokens: 0 };
  private readonly toolCalls = new Map<number, ToolCallParts>();

  constructor(
    private readonly endpoint: BridgeEndpoint,
    private readonly model: string,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /** True once the final line has been produced. */
  get done(): boolean {
    return this.finished;
  }

  push(text: string): string[] {
    if (this.finished) return [];
    this.buffer += text;

    const out: string[] = [];
    let newline = this.buffer.indexOf('\n');
    while (newline !== -1 && !this.finished) {
      const line = this.buffer.slice(0, newline);
      this.buffer = this.buffer.slice(newline + 1);
      this.processLine(line, out);
      newline = this.buffer.indexOf('\n');
    }

    if (this.buffer.length > MAX_LINE_BUFFER) {
      throw new Error('Upstream event stream line exceeds 1MB');
    }
    return out;
  }

  /** Flush at end of the upstream body. */
  finish(): string[] {
    if (this.finished) return [];
    const out: string[] = [];
    const rest = this.buffer;
    this.buffer = '';
    if (rest.length > 0) this.processLine(rest, out);
    if (!this.finished) this.end(out);
    return out;
  }

  private processLine(raw: string, out: string[]): void {
    const line = raw.trim();
    if (!line.startsWith('data:')) return;

    const data = line.slice(5).trim();
    if (data === '[DONE]') {
      this.end(out);
      return;
    }

    let chunk: unknown;
    try {
      chunk = JSON.parse(data);
    } catch (err) {
      throw new Error(`Malformed upstream event: ${data.slice(0, 200)}`, { cause: err });
    }
    if (!isPlainObject(chunk)) return;

    const usage = readUsage(chunk['usage']);
    if (usage) this.usage = usage;

    const choice = firstChoice(chunk);
    if (!choice) return;

    const delta: Record<string, unknown> = isPlainObject(choice['delta']) ? choice['delta'] : {};
    const content = typeof delta['content'] === 'string' ? delta['content'] : '';
    if (content.length > 0) {
      out.push(JSON.stringify({ ...this.payload(content, null), done: false }));
    }
    if (Array.isArray(delta['tool_calls'])) {
      this.collectToolCalls(delta['tool_calls']);
    }

    if (typeof choice['finish_reason'] === 'string') {
      this.doneReason = choice['finish_reason'];
      this.flushToolCalls(out);
    }
  }

  private collectToolCalls(deltas: unknown[]): void {
    deltas.forEach((delta: unknown, position) => {
      if (!isPlainObject(delta)) return;
      const index = typeof delta['index'] === 'number' ? delta['index'] : position;
      const parts = this.toolCalls.get(index) ?? { name: '', arguments: '' };
      const fn: Record<string, unknown> = isPlainObject(delta['function']) ? delta['function'] : {};
      if (typeof fn['name'] === 'string') parts.name += fn['name'];
      if (typeof fn['arguments'] === 'string') parts.arguments += fn['arguments'];
      this.toolCalls.set(index, parts);
    });
  }

  private flushToolCalls(out: string[]): void {
    if (this.toolCalls.size === 0) return;
    const calls = [...this.toolCalls.entries()]
      .sort(([a], [b]) => a - b)
      .map(([, parts]) => toOllamaToolCall(parts.name, parts.arguments));
    this.toolCalls.clear();
    out.push(JSON.stringify({ ...this.payload('', calls), done: false }));
  }

  private payload(content: string, toolCalls: unknown[] | null): Record<string, unknown> {
    return ollamaPayload(this.endpoint, this.model, this.clock(), content, toolCalls);
  }

  private end(out: string[]): void {
    this.flushToolCalls(out);
    this.finished = true;
    out.push(
      JSON.stringify({
        ...this.payload('', null),
        done: true,
        done_reason: this.doneReason,
        prompt_eval_count: this.usage.promptTokens,
        eval_count: this.usage.completionTokens,
      })
    );
  }
}
