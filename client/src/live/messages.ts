// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import type * as types from '@google/genai';
import type { MediaResolution, Modality } from '@google/genai';
import { MalformedFrameError, UsageError } from '../_exceptions.js';
import {
  type ClientMessage,
  type LiveAPIModels,
  type ServerMessage,
  type UsageMetadata,
  type WireContent,
  type WireFunctionResponse,
  type WirePart,
  type WireRealtimeInput,
  type WireServerPart,
  type WireSetup,
  clientMessageSchema,
  serverMessageSchema,
} from './api_proto.js';

export type { UsageMetadata } from './api_proto.js';

export type Role = 'user' | 'model';

interface PartBase {
  /** Set on parts that carry the model's reasoning rather than its answer. */
  thought?: boolean;
}

export interface TextPart extends PartBase {
  type: 'text';
  text: string;
}

export interface InlineDataPart extends PartBase {
  type: 'inline_data';
  data: Uint8Array;
  mimeType: string;
}

export interface FileDataPart extends PartBase {
  type: 'file_data';
  fileUri: string;
  mimeType: string;
}

export interface FunctionCall {
  id?: string;
  name: string;
  args: Record<string, unknown>;
}

export interface FunctionResponse {
  id?: string;
  name: string;
  response: Record<string, unknown>;
  willContinue?: boolean;
  scheduling?: 'SILENT' | 'WHEN_IDLE' | 'INTERRUPT';
}

export interface FunctionCallPart extends PartBase, FunctionCall {
  type: 'function_call';
}

export interface FunctionResponsePart extends PartBase, FunctionResponse {
  type: 'function_response';
}

export interface ExecutableCodePart extends PartBase {
  type: 'executable_code';
  language: string;
  code: string;
}

export interface CodeExecutionResultPart extends PartBase {
  type: 'code_execution_result';
  outcome: 'OUTCOME_OK' | 'OUTCOME_FAILED' | 'OUTCOME_DEADLINE_EXCEEDED';
  output?: string;
}

export type Part =
  | TextPart
  | InlineDataPart
  | FileDataPart
  | FunctionCallPart
  | FunctionResponsePart
  | ExecutableCodePart
  | CodeExecutionResultPart;

export interface Content {
  /** Optional on system instructions. */
  role?: Role;
  parts: Part[];
}

/**
 * Opaque media bytes tagged with their encoding, e.g. `audio/pcm;rate=16000`.
 * The client never inspects or resamples the payload.
 */
export interface MediaChunk {
  data: Uint8Array;
  mimeType: string;
}

export type AudioChunk = MediaChunk;

export interface GenerationConfig {
  candidateCount?: number;
  maxOutputTokens?: number;
  temperature?: number;
  topP?: number;
  topK?: number;
  presencePenalty?: number;
  frequencyPenalty?: number;
  seed?: number;
  stopSequences?: string[];
  responseModalities?: Modality[];
  speechConfig?: types.SpeechConfig;
  mediaResolution?: MediaResolution;
  enableAffectiveDialog?: boolean;
  thinkingConfig?: types.ThinkingConfig;
  /** For example `application/json`, together with {@link GenerationConfig.responseSchema}. */
  responseMimeType?: string;
  responseSchema?: types.Schema;
  responseLogprobs?: boolean;
  /** Number of top candidate tokens to return log probabilities for. */
  logprobs?: number;
  enableEnhancedCivicAnswers?: boolean;
}

/**
 * Caller-facing form of the session configuration, accepted by {@link createSetup}.
 */
export interface SetupConfig {
  /** `gemini-2.0-flash-live-001` and `models/gemini-2.0-flash-live-001` are equivalent. */
  model: LiveAPIModels | string;
  generationConfig?: Readonly<GenerationConfig>;
  /** A plain string becomes a single text part. */
  systemInstruction?: Readonly<Content> | string;
  tools?: readonly types.Tool[];
  realtimeInputConfig?: types.RealtimeInputConfig;
  /** Pass the handle of a previous session to resume it. */
  sessionResumption?: types.SessionResumptionConfig;
  contextWindowCompression?: types.ContextWindowCompressionConfig;
  /** Ask the server to transcribe the caller's audio. */
  inputAudioTranscription?: boolean;
  /** Ask the server to transcribe the model's audio. */
  outputAudioTranscription?: boolean;
}

/**
 * Frozen session configuration. Build it with {@link createSetup}.
 */
export interface Setup {
  readonly model: string;
  readonly generationConfig?: Readonly<GenerationConfig>;
  readonly systemInstruction?: Readonly<Content>;
  readonly tools?: readonly types.Tool[];
  readonly realtimeInputConfig?: types.RealtimeInputConfig;
  readonly sessionResumption?: types.SessionResumptionConfig;
  readonly contextWindowCompression?: types.ContextWindowCompressionConfig;
  readonly inputAudioTranscription?: boolean;
  readonly outputAudioTranscription?: boolean;
}

export type RealtimeInput =
  | ({ kind: 'audio' } & MediaChunk)
  | ({ kind: 'video' } & MediaChunk)
  | { kind: 'text'; text: string }
  | { kind: 'activity_start' }
  | { kind: 'activity_end' }
  | { kind: 'audio_stream_end' };

export type OutboundMessage =
  | { type: 'setup'; setup: Setup }
  | { type: 'client_content'; turns: Content[]; turnComplete: boolean }
  | { type: 'realtime_input'; input: RealtimeInput }
  | { type: 'tool_response'; functionResponses: FunctionResponse[] };

export interface Transcription {
  text: string;
  finished?: boolean;
}

export interface SetupCompleteEvent {
  type: 'setup_complete';
  sessionId?: string;
}

export interface ServerContentEvent {
  type: 'server_content';
  /** Absent on frames that only carry flags or transcriptions. */
  content?: Content;
  turnComplete: boolean;
  generationComplete: boolean;
  inputTranscription?: Transcription;
  outputTranscription?: Transcription;
  groundingMetadata?: Record<string, unknown>;
  usageMetadata?: UsageMetadata;
}

export interface InterruptedEvent {
  type: 'interrupted';
}

export interface ToolCallEvent {
  type: 'tool_call';
  functionCalls: FunctionCall[];
}

export interface ToolCallCancellationEvent {
  type: 'tool_call_cancellation';
  ids: string[];
}

export interface GoAwayEvent {
  type: 'go_away';
  /** Time left before the server drops the connection, when the server sent one. */
  timeLeftMs: number | null;
}

export interface SessionResumptionUpdateEvent {
  type: 'session_resumption_update';
  newHandle?: string;
  resumable: boolean;
}

export interface UsageMetadataEvent {
  type: 'usage_metadata';
  usage: UsageMetadata;
}

export type SessionErrorReason = 'malformed_frame' | 'protocol' | 'transport';

export interface SessionErrorEvent {
  type: 'session_error';
  reason: SessionErrorReason;
  error: Error;
  /** Fatal errors are the last event of the stream. */
  fatal: boolean;
}

export interface ClosedEvent {
  type: 'closed';
  code: number;
  reason: string;
}

export type InboundEvent =
  | SetupCompleteEvent
  | ServerContentEvent
  | InterruptedEvent
  | ToolCallEvent
  | ToolCallCancellationEvent
  | GoAwayEvent
  | SessionResumptionUpdateEvent
  | UsageMetadataEvent
  | SessionErrorEvent
  | ClosedEvent;

export type InboundEventType = InboundEvent['type'];

const MODEL_PREFIXES = ['models/', 'tunedModels/'];

/**
 * Returns the resource path of a model, adding the `models/` prefix when it is missing.
 */
export function normalizeModelName(model: string): string {
  const name = model.trim();
  if (name === '' || MODEL_PREFIXES.includes(name)) {
    throw new UsageError('model must not be empty');
  }
  return MODEL_PREFIXES.some((prefix) => name.startsWith(prefix)) ? name : `models/${name}`;
}

function deepFreeze<T>(value: T): T {
  // typed arrays with elements cannot be frozen; errors stay owned by their producer
  if (
    typeof value !== 'object' ||
    value === null ||
    ArrayBuffer.isView(value) ||
    value instanceof Error
  ) {
    return value;
  }
  if (!Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Validates and freezes a session configuration. The input is copied, so later changes to
 * it do not reach the session.
 */
export function createSetup(config: SetupConfig): Setup {
  const copy = structuredClone(config);
  const systemInstruction =
    typeof copy.systemInstruction === 'string'
      ? { parts: [textPart(copy.systemInstruction)] }
      : copy.systemInstruction;

  const setup: Setup = {
    model: normalizeModelName(copy.model),
    ...(copy.generationConfig && { generationConfig: copy.generationConfig }),
    ...(systemInstruction && { systemInstruction }),
    ...(copy.tools && { tools: copy.tools }),
    ...(copy.realtimeInputConfig && { realtimeInputConfig: copy.realtimeInputConfig }),
    ...(copy.sessionResumption && { sessionResumption: copy.sessionResumption }),
    ...(copy.contextWindowCompression && {
      contextWindowCompression: copy.contextWindowCompression,
    }),
    ...(copy.inputAudioTranscription && { inputAudioTranscription: true }),
    ...(copy.outputAudioTranscription && { outputAudioTranscription: true }),
  };
  return deepFreeze(setup);
}

export function textPart(text: string, options: { thought?: boolean } = {}): TextPart {
  return { type: 'text', text, ...(options.thought !== undefined && { thought: options.thought }) };
}

export function inlineDataPart(data: Uint8Array, mimeType: string): InlineDataPart {
  return { type: 'inline_data', data, mimeType };
}

export function userContent(parts: string | Part[]): Content {
  return { role: 'user', parts: typeof parts === 'string' ? [textPart(parts)] : parts };
}

// Encoding

const encodeBytes = (data: Uint8Array): string =>
  Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString('base64');

function encodePart(part: Part): WirePart {
  const thought = part.thought;
  switch (part.type) {
    case 'text':
      return { text: part.text, thought };
    case 'inline_data':
      return { inlineData: { mimeType: part.mimeType, data: encodeBytes(part.data) }, thought };
    case 'file_data':
      return { fileData: { mimeType: part.mimeType, fileUri: part.fileUri }, thought };
    case 'function_call':
      return { functionCall: { id: part.id, name: part.name, args: part.args }, thought };
    case 'function_response':
      return { functionResponse: encodeFunctionResponse(part), thought };
    case 'executable_code':
      return { executableCode: { language: part.language, code: part.code }, thought };
    case 'code_execution_result':
      return { codeExecutionResult: { outcome: part.outcome, output: part.output }, thought };
  }
}

function encodeContent(content: Readonly<Content>): WireContent {
  return { role: content.role, parts: content.parts.map(encodePart) };
}

function encodeFunctionResponse(response: FunctionResponse): WireFunctionResponse {
  return {
    id: response.id,
    name: response.name,
    response: response.response,
    willContinue: response.willContinue,
    scheduling: response.scheduling,
  };
}

function encodeSetup(setup: Setup): WireSetup {
  return {
    model: setup.model,
    generationConfig: setup.generationConfig,
    systemInstruction: setup.systemInstruction && encodeContent(setup.systemInstruction),
    tools: setup.tools && [...setup.tools],
    realtimeInputConfig: setup.realtimeInputConfig,
    sessionResumption: setup.sessionResumption,
    contextWindowCompression: setup.contextWindowCompression,
    inputAudioTranscription: setup.inputAudioTranscription ? {} : undefined,
    outputAudioTranscription: setup.outputAudioTranscription ? {} : undefined,
  };
}

function encodeRealtimeInput(input: RealtimeInput): WireRealtimeInput {
  switch (input.kind) {
    case 'audio':
      return { audio: { mimeType: input.mimeType, data: encodeBytes(input.data) } };
    case 'video':
      return { video: { mimeType: input.mimeType, data: encodeBytes(input.data) } };
    case 'text':
      return { text: input.text };
    case 'activity_start':
      return { activityStart: {} };
    case 'activity_end':
      return { activityEnd: {} };
    case 'audio_stream_end':
      return { audioStreamEnd: true };
  }
}

/**
 * Maps an outbound message to its wire frame, before serialization.
 */
export function toClientMessage(message: OutboundMessage): ClientMessage {
  switch (message.type) {
    case 'setup':
      return { setup: encodeSetup(message.setup) };
    case 'client_content':
      return {
        clientContent: {
          turns: message.turns.map(encodeContent),
          turnComplete: message.turnComplete,
        },
      };
    case 'realtime_input':
      return { realtimeInput: encodeRealtimeInput(message.input) };
    case 'tool_response':
      return {
        toolResponse: { functionResponses: message.functionResponses.map(encodeFunctionResponse) },
      };
  }
}

/**
 * Serializes an outbound message to the JSON text frame sent on the socket.
 */
export function encodeClientMessage(message: OutboundMessage): string {
  return JSON.stringify(toClientMessage(message));
}

// Decoding

const BASE64_RE = /^[A-Za-z0-9+/_-]*={0,2}$/;

function decodeBytes(data: string, frame: string): Uint8Array {
  if (!BASE64_RE.test(data)) {
    throw new MalformedFrameError('inline data is not valid base64', frame);
  }
  return Uint8Array.from(Buffer.from(data, 'base64'));
}

function decodePart(part: WireServerPart, frame: string): Part {
  const base: PartBase = part.thought === undefined ? {} : { thought: part.thought };
  if (part.text !== undefined) {
    return { type: 'text', text: part.text, ...base };
  }
  if (part.inlineData) {
    return {
      type: 'inline_data',
      data: decodeBytes(part.inlineData.data, frame),
      mimeType: part.inlineData.mimeType,
      ...base,
    };
  }
  if (part.fileData) {
    return { type: 'file_data', ...part.fileData, ...base };
  }
  if (part.functionCall) {
    return { type: 'function_call', ...part.functionCall, ...base };
  }
  if (part.functionResponse) {
    return { type: 'function_response', ...part.functionResponse, ...base };
  }
  if (part.executableCode) {
    return { type: 'executable_code', ...part.executableCode, ...base };
  }
  if (part.codeExecutionResult) {
    return { type: 'code_execution_result', ...part.codeExecutionResult, ...base };
  }
  throw new MalformedFrameError('part has no known payload', frame);
}

function decodeContent(
  content: { role?: Role; parts: WireServerPart[] },
  frame: string,
): Content {
  const parts = content.parts.map((part) => decodePart(part, frame));
  return content.role === undefined ? { parts } : { role: content.role, parts };
}

const DURATION_RE = /^(\d+(?:\.\d+)?)s$/;

/** Parses a protobuf JSON duration such as `"12.5s"`. */
function parseDurationMs(value: string | undefined): number | null {
  const match = value === undefined ? null : DURATION_RE.exec(value);
  return match ? Math.round(Number(match[1]) * 1000) : null;
}

function parseFrame(payload: string): unknown {
  try {
    return JSON.parse(payload);
  } catch (error) {
    throw new MalformedFrameError('frame is not valid JSON', payload, { cause: error });
  }
}

function toInboundEvent(message: ServerMessage, frame: string): InboundEvent {
  if (message.setupComplete) {
    return { type: 'setup_complete', sessionId: message.setupComplete.sessionId };
  }
  if (message.serverContent) {
    const serverContent = message.serverContent;
    if (serverContent.interrupted) {
      return { type: 'interrupted' };
    }
    const event: ServerContentEvent = {
      type: 'server_content',
      turnComplete: serverContent.turnComplete ?? false,
      generationComplete: serverContent.generationComplete ?? false,
    };
    if (serverContent.modelTurn) event.content = decodeContent(serverContent.modelTurn, frame);
    if (serverContent.inputTranscription) {
      event.inputTranscription = serverContent.inputTranscription;
    }
    if (serverContent.outputTranscription) {
      event.outputTranscription = serverContent.outputTranscription;
    }
    if (serverContent.groundingMetadata) {
      event.groundingMetadata = serverContent.groundingMetadata;
    }
    if (message.usageMetadata) event.usageMetadata = message.usageMetadata;
    return event;
  }
  if (message.toolCall) {
    return { type: 'tool_call', functionCalls: message.toolCall.functionCalls };
  }
  if (message.toolCallCancellation) {
    return { type: 'tool_call_cancellation', ids: message.toolCallCancellation.ids };
  }
  if (message.goAway) {
    return { type: 'go_away', timeLeftMs: parseDurationMs(message.goAway.timeLeft) };
  }
  if (message.sessionResumptionUpdate) {
    const update = message.sessionResumptionUpdate;
    return {
      type: 'session_resumption_update',
      newHandle: update.newHandle,
      resumable: update.resumable ?? false,
    };
  }
  if (message.usageMetadata) {
    return { type: 'usage_metadata', usage: message.usageMetadata };
  }
  throw new MalformedFrameError('unknown server message', frame);
}

/**
 * Decodes one server frame. Never throws: a frame that cannot be decoded becomes a non-fatal
 * `session_error` event with reason `malformed_frame`.
 */
export function decodeServerMessage(payload: string): InboundEvent {
  try {
    const parsed = serverMessageSchema.safeParse(parseFrame(payload));
    if (!parsed.success) {
      throw new MalformedFrameError(
        `invalid server message: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`,
        payload,
        { cause: parsed.error },
      );
    }
    return deepFreeze(toInboundEvent(parsed.data, payload));
  } catch (error) {
    if (error instanceof MalformedFrameError) {
      const event: SessionErrorEvent = {
        type: 'session_error',
        reason: 'malformed_frame',
        error,
        fatal: false,
      };
      return deepFreeze(event);
    }
    throw error;
  }
}

/**
 * Decodes a client frame the way the server reads it; the inverse of
 * {@link encodeClientMessage}.
 *
 * @throws MalformedFrameError when the payload is not exactly one valid client message
 */
export function decodeClientMessage(payload: string): OutboundMessage {
  const parsed = clientMessageSchema.safeParse(parseFrame(payload));
  if (!parsed.success) {
    throw new MalformedFrameError('invalid client message', payload, { cause: parsed.error });
  }
  const message = parsed.data;
  const keys = Object.values(message).filter((value) => value !== undefined).length;
  if (keys !== 1) {
    throw new MalformedFrameError(`expected exactly one message, got ${keys}`, payload);
  }

  if (message.setup) {
    const { systemInstruction, inputAudioTranscription, outputAudioTranscription, ...rest } =
      message.setup;
    return {
      type: 'setup',
      setup: createSetup({
        ...rest,
        systemInstruction: systemInstruction && decodeContent(systemInstruction, payload),
        inputAudioTranscription: inputAudioTranscription !== undefined,
        outputAudioTranscription: outputAudioTranscription !== undefined,
      }),
    };
  }
  if (message.clientContent) {
    return {
      type: 'client_content',
      turns: message.clientContent.turns.map((turn) => decodeContent(turn, payload)),
      turnComplete: message.clientContent.turnComplete,
    };
  }
  if (message.toolResponse) {
    return { type: 'tool_response', functionResponses: message.toolResponse.functionResponses };
  }

  const input = message.realtimeInput;
  if (!input) {
    throw new MalformedFrameError('unknown client message', payload);
  }
  if (input.audio) {
    return {
      type: 'realtime_input',
      input: {
        kind: 'audio',
        data: decodeBytes(input.audio.data, payload),
        mimeType: input.audio.mimeType,
      },
    };
  }
  if (input.video) {
    return {
      type: 'realtime_input',
      input: {
        kind: 'video',
        data: decodeBytes(input.video.data, payload),
        mimeType: input.video.mimeType,
      },
    };
  }
  if (input.text !== undefined) {
    return { type: 'realtime_input', input: { kind: 'text', text: input.text } };
  }
  if (input.activityStart) return { type: 'realtime_input', input: { kind: 'activity_start' } };
  if (input.activityEnd) return { type: 'realtime_input', input: { kind: 'activity_end' } };
  if (input.audioStreamEnd) {
    return { type: 'realtime_input', input: { kind: 'audio_stream_end' } };
  }
  throw new MalformedFrameError('realtime input carries no payload', payload);
}
