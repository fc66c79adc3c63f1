// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { ApiError, GoogleGenAI, Language, Outcome } from '@google/genai';
import type * as types from '@google/genai';
import { APIStatusError, ConnectionError, UsageError, isAPIError } from '../_exceptions.js';
import { loadEnvConfig } from '../config.js';
import type {
  CodeExecutionResultPart,
  Content,
  GenerationConfig,
  Part,
  Role,
} from '../live/messages.js';
import { normalizeModelName, userContent } from '../live/messages.js';
import { log } from '../log.js';

/**
 * The part of `GoogleGenAI.models` this client calls.
 */
export interface GenerateContentApi {
  generateContent(params: types.GenerateContentParameters): Promise<types.GenerateContentResponse>;
  generateContentStream(
    params: types.GenerateContentParameters,
  ): Promise<AsyncGenerator<types.GenerateContentResponse>>;
}

export interface RestClientOptions {
  /** Falls back to `GEMINI_API_KEY`, then `GOOGLE_API_KEY`. */
  apiKey?: string;
  /** Falls back to `GEMINI_REST_MODEL`. */
  model?: string;
  /** Used instead of a client built from `apiKey`. */
  client?: { models: GenerateContentApi };
}

export interface GenerateContentRequest {
  /** A string is sent as a single user turn. */
  contents: Content[] | string;
  /** Overrides the client's model for this request. */
  model?: string;
  systemInstruction?: Content | string;
  generationConfig?: GenerationConfig;
  tools?: types.Tool[];
  safetySettings?: types.SafetySetting[];
  signal?: AbortSignal;
}

export interface Candidate {
  index?: number;
  content?: Content;
  finishReason?: string;
  safetyRatings?: types.SafetyRating[];
}

export interface GenerateContentResult {
  candidates: Candidate[];
  /** Text of the first candidate, without its thought parts. */
  text: string;
  usageMetadata?: types.GenerateContentResponseUsageMetadata;
  /** Set when the prompt itself was blocked; `candidates` is then empty. */
  promptFeedback?: types.GenerateContentResponsePromptFeedback;
  modelVersion?: string;
  responseId?: string;
}

function toGenaiPart(part: Part): types.Part {
  const thought = part.thought;
  switch (part.type) {
    case 'text':
      return { text: part.text, thought };
    case 'inline_data':
      return {
        inlineData: { mimeType: part.mimeType, data: Buffer.from(part.data).toString('base64') },
        thought,
      };
    case 'file_data':
      return { fileData: { mimeType: part.mimeType, fileUri: part.fileUri }, thought };
    case 'function_call':
      return { functionCall: { id: part.id, name: part.name, args: part.args }, thought };
    case 'function_response':
      return {
        functionResponse: { id: part.id, name: part.name, response: part.response },
        thought,
      };
    case 'executable_code':
      return {
        executableCode: {
          code: part.code,
          language: part.language === 'PYTHON' ? Language.PYTHON : Language.LANGUAGE_UNSPECIFIED,
        },
        thought,
      };
    case 'code_execution_result':
      return {
        codeExecutionResult: { outcome: Outcome[part.outcome], output: part.output },
        thought,
      };
  }
}

function toGenaiContent(content: Content): types.Content {
  return { role: content.role, parts: content.parts.map(toGenaiPart) };
}

function fromGenaiOutcome(outcome: Outcome | undefined): CodeExecutionResultPart['outcome'] {
  switch (outcome) {
    case Outcome.OUTCOME_OK:
      return 'OUTCOME_OK';
    case Outcome.OUTCOME_DEADLINE_EXCEEDED:
      return 'OUTCOME_DEADLINE_EXCEEDED';
    default:
      return 'OUTCOME_FAILED';
  }
}

function fromGenaiPart(part: types.Part): Part | null {
  const base = part.thought === undefined ? {} : { thought: part.thought };
  if (part.text !== undefined) {
    return { type: 'text', text: part.text, ...base };
  }
  if (part.inlineData) {
    return {
      type: 'inline_data',
      data: Uint8Array.from(Buffer.from(part.inlineData.data ?? '', 'base64')),
      mimeType: part.inlineData.mimeType ?? 'application/octet-stream',
      ...base,
    };
  }
  if (part.fileData?.fileUri) {
    return {
      type: 'file_data',
      fileUri: part.fileData.fileUri,
      mimeType: part.fileData.mimeType ?? 'application/octet-stream',
      ...base,
    };
  }
  if (part.functionCall?.name) {
    return {
      type: 'function_call',
      id: part.functionCall.id,
      name: part.functionCall.name,
      args: part.functionCall.args ?? {},
      ...base,
    };
  }
  if (part.executableCode) {
    return {
      type: 'executable_code',
      language: part.executableCode.language ?? Language.LANGUAGE_UNSPECIFIED,
      code: part.executableCode.code ?? '',
      ...base,
    };
  }
  if (part.codeExecutionResult) {
    return {
      type: 'code_execution_result',
      outcome: fromGenaiOutcome(part.codeExecutionResult.outcome),
      output: part.codeExecutionResult.output,
      ...base,
    };
  }
  return null;
}

function fromGenaiRole(role: string | undefined): Role | undefined {
  return role === 'user' || role === 'model' ? role : undefined;
}

function fromGenaiContent(content: types.Content): Content {
  const parts: Part[] = [];
  for (const part of content.parts ?? []) {
    const converted = fromGenaiPart(part);
    if (converted) parts.push(converted);
  }
  const role = fromGenaiRole(content.role);
  return role ? { role, parts } : { parts };
}

function toResult(response: types.GenerateContentResponse): GenerateContentResult {
  const candidates: Candidate[] = (response.candidates ?? []).map((candidate) => ({
    index: candidate.index,
    content: candidate.content && fromGenaiContent(candidate.content),
    finishReason: candidate.finishReason,
    safetyRatings: candidate.safetyRatings,
  }));
  const text = (candidates[0]?.content?.parts ?? [])
    .map((part) => (part.type === 'text' && !part.thought ? part.text : ''))
    .join('');
  return {
    candidates,
    text,
    usageMetadata: response.usageMetadata,
    promptFeedback: response.promptFeedback,
    modelVersion: response.modelVersion,
    responseId: response.responseId,
  };
}

function toClientError(error: unknown, operation: string): Error {
  if (isAPIError(error)) return error;
  if (error instanceof ApiError) {
    return new APIStatusError({
      message: `${operation} failed: ${error.message}`,
      options: { statusCode: error.status, cause: error },
    });
  }
  return new ConnectionError({ message: `${operation} failed`, options: { cause: error } });
}

/**
 * Request/response access to `generateContent` and `streamGenerateContent`. Failed requests
 * are not retried.
 */
export class RestClient {
  readonly model: string;
  #client: { models: GenerateContentApi };
  #logger = log();

  constructor({ apiKey, model, client }: RestClientOptions = {}) {
    const env = client && model ? undefined : loadEnvConfig();
    this.model = normalizeModelName(model ?? env?.restModel ?? '');

    if (client) {
      this.#client = client;
    } else {
      const key = apiKey ?? env?.apiKey;
      if (!key) {
        throw new UsageError(
          'API key is required, either using the argument or by setting the GEMINI_API_KEY environment variable',
        );
      }
      this.#client = new GoogleGenAI({ apiKey: key });
    }
  }

  #buildParams(request: GenerateContentRequest): types.GenerateContentParameters {
    const contents =
      typeof request.contents === 'string' ? [userContent(request.contents)] : request.contents;
    if (contents.length === 0) {
      throw new UsageError('contents must not be empty');
    }
    const systemInstruction =
      typeof request.systemInstruction === 'string'
        ? { parts: [{ text: request.systemInstruction }] }
        : request.systemInstruction && toGenaiContent(request.systemInstruction);
    // affective dialog is a Live-only setting
    const { enableAffectiveDialog: _, ...generationConfig } = request.generationConfig ?? {};

    return {
      model: request.model ? normalizeModelName(request.model) : this.model,
      contents: contents.map(toGenaiContent),
      config: {
        ...generationConfig,
        systemInstruction,
        tools: request.tools,
        safetySettings: request.safetySettings,
        abortSignal: request.signal,
      },
    };
  }

  /**
   * @throws APIStatusError when the server answers with an error status
   * @throws ConnectionError when the request does not reach the server
   */
  async generateContent(request: GenerateContentRequest): Promise<GenerateContentResult> {
    const params = this.#buildParams(request);
    this.#logger.debug({ model: params.model }, 'generateContent');
    try {
      return toResult(await this.#client.models.generateContent(params));
    } catch (error) {
      throw toClientError(error, 'generateContent');
    }
  }

  /**
   * Yields one result per server-sent chunk.
   *
   * @throws APIStatusError when the server answers with an error status
   * @throws ConnectionError when the request does not reach the server
   */
  async *streamGenerateContent(
    request: GenerateContentRequest,
  ): AsyncGenerator<GenerateContentResult, void, undefined> {
    const params = this.#buildParams(request);
    this.#logger.debug({ model: params.model }, 'streamGenerateContent');
    let stream: AsyncGenerator<types.GenerateContentResponse>;
    try {
      stream = await this.#client.models.generateContentStream(params);
    } catch (error) {
      throw toClientError(error, 'streamGenerateContent');
    }
    try {
      for await (const chunk of stream) {
        yield toResult(chunk);
      }
    } catch (error) {
      throw toClientError(error, 'streamGenerateContent');
    }
  }
}
