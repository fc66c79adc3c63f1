// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import type * as types from '@google/genai';
import { MediaResolution, Modality } from '@google/genai';
import { z } from 'zod';

/**
 * Models known to serve the Live API
 */
export type LiveAPIModels =
  | 'gemini-2.0-flash-live-001'
  | 'gemini-2.0-flash-exp'
  | 'gemini-2.5-flash-preview-native-audio-dialog'
  | 'gemini-2.5-flash-exp-native-audio-thinking-dialog'
  | 'gemini-live-2.5-flash-preview';

// Client → server. Field names are the JSON names of the BidiGenerateContent protocol.

export interface Blob {
  mimeType: string;
  /** base64 */
  data: string;
}

export interface WirePart {
  text?: string;
  inlineData?: Blob;
  fileData?: { mimeType: string; fileUri: string };
  functionCall?: { id?: string; name: string; args: Record<string, unknown> };
  functionResponse?: WireFunctionResponse;
  executableCode?: { language: string; code: string };
  codeExecutionResult?: { outcome: string; output?: string };
  thought?: boolean;
}

export interface WireContent {
  role?: string;
  parts: WirePart[];
}

export interface WireFunctionResponse {
  id?: string;
  name: string;
  response: Record<string, unknown>;
  willContinue?: boolean;
  scheduling?: string;
}

export interface WireSetup {
  model: string;
  generationConfig?: z.input<typeof generationConfigSchema>;
  systemInstruction?: WireContent;
  tools?: types.Tool[];
  realtimeInputConfig?: types.RealtimeInputConfig;
  sessionResumption?: types.SessionResumptionConfig;
  contextWindowCompression?: types.ContextWindowCompressionConfig;
  inputAudioTranscription?: types.AudioTranscriptionConfig;
  outputAudioTranscription?: types.AudioTranscriptionConfig;
}

export interface WireRealtimeInput {
  audio?: Blob;
  video?: Blob;
  text?: string;
  activityStart?: Record<string, never>;
  activityEnd?: Record<string, never>;
  audioStreamEnd?: boolean;
}

/**
 * Union of every client frame. Exactly one key is set per frame.
 */
export type ClientMessage =
  | { setup: WireSetup }
  | { clientContent: { turns: WireContent[]; turnComplete: boolean } }
  | { realtimeInput: WireRealtimeInput }
  | { toolResponse: { functionResponses: WireFunctionResponse[] } };

// Server → client

const blobSchema = z.object({
  mimeType: z.string(),
  data: z.string(),
});

const functionCallSchema = z.object({
  id: z.string().optional(),
  name: z.string(),
  args: z.record(z.unknown()).default({}),
});

export const functionResponseSchema = z.object({
  id: z.string().optional(),
  name: z.string(),
  response: z.record(z.unknown()),
  willContinue: z.boolean().optional(),
  scheduling: z.enum(['SILENT', 'WHEN_IDLE', 'INTERRUPT']).optional(),
});

export const partSchema = z
  .object({
    text: z.string().optional(),
    inlineData: blobSchema.optional(),
    fileData: z.object({ mimeType: z.string(), fileUri: z.string() }).optional(),
    functionCall: functionCallSchema.optional(),
    functionResponse: functionResponseSchema.optional(),
    executableCode: z.object({ language: z.string(), code: z.string() }).optional(),
    codeExecutionResult: z
      .object({
        outcome: z.enum(['OUTCOME_OK', 'OUTCOME_FAILED', 'OUTCOME_DEADLINE_EXCEEDED']),
        output: z.string().optional(),
      })
      .optional(),
    thought: z.boolean().optional(),
  })
  .passthrough();

export const contentSchema = z.object({
  role: z.enum(['user', 'model']).optional(),
  parts: z.array(partSchema).default([]),
});

export const transcriptionSchema = z.object({
  text: z.string().default(''),
  finished: z.boolean().optional(),
});

const modalityTokenCountSchema = z.object({
  modality: z.string(),
  tokenCount: z.number().int().default(0),
});

export const usageMetadataSchema = z.object({
  promptTokenCount: z.number().int().optional(),
  cachedContentTokenCount: z.number().int().optional(),
  responseTokenCount: z.number().int().optional(),
  toolUsePromptTokenCount: z.number().int().optional(),
  thoughtsTokenCount: z.number().int().optional(),
  totalTokenCount: z.number().int().optional(),
  promptTokensDetails: z.array(modalityTokenCountSchema).default([]),
  cacheTokensDetails: z.array(modalityTokenCountSchema).default([]),
  responseTokensDetails: z.array(modalityTokenCountSchema).default([]),
  toolUsePromptTokensDetails: z.array(modalityTokenCountSchema).default([]),
});

export const serverMessageSchema = z
  .object({
    setupComplete: z.object({ sessionId: z.string().optional() }).passthrough().optional(),
    serverContent: z
      .object({
        modelTurn: contentSchema.optional(),
        turnComplete: z.boolean().optional(),
        generationComplete: z.boolean().optional(),
        interrupted: z.boolean().optional(),
        groundingMetadata: z.record(z.unknown()).optional(),
        inputTranscription: transcriptionSchema.optional(),
        outputTranscription: transcriptionSchema.optional(),
        waitingForInput: z.boolean().optional(),
      })
      .passthrough()
      .optional(),
    toolCall: z.object({ functionCalls: z.array(functionCallSchema).default([]) }).optional(),
    toolCallCancellation: z.object({ ids: z.array(z.string()).default([]) }).optional(),
    goAway: z.object({ timeLeft: z.string().optional() }).optional(),
    sessionResumptionUpdate: z
      .object({
        newHandle: z.string().optional(),
        resumable: z.boolean().optional(),
      })
      .optional(),
    usageMetadata: usageMetadataSchema.optional(),
  })
  .passthrough();

export type ServerMessage = z.infer<typeof serverMessageSchema>;
export type WireServerPart = z.infer<typeof partSchema>;
export type UsageMetadata = z.infer<typeof usageMetadataSchema>;

// Client frames as read back by a server; used by the in-process test server.

const realtimeInputSchema = z.object({
  audio: blobSchema.optional(),
  video: blobSchema.optional(),
  text: z.string().optional(),
  activityStart: z.object({}).optional(),
  activityEnd: z.object({}).optional(),
  audioStreamEnd: z.boolean().optional(),
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const generationConfigSchema = z.object({
  candidateCount: z.number().int().optional(),
  maxOutputTokens: z.number().int().optional(),
  temperature: z.number().optional(),
  topP: z.number().optional(),
  topK: z.number().optional(),
  presencePenalty: z.number().optional(),
  frequencyPenalty: z.number().optional(),
  seed: z.number().int().optional(),
  stopSequences: z.array(z.string()).optional(),
  responseModalities: z.array(z.nativeEnum(Modality)).optional(),
  speechConfig: z.custom<types.SpeechConfig>(isRecord).optional(),
  mediaResolution: z.nativeEnum(MediaResolution).optional(),
  enableAffectiveDialog: z.boolean().optional(),
  thinkingConfig: z
    .object({
      includeThoughts: z.boolean().optional(),
      thinkingBudget: z.number().int().optional(),
    })
    .optional(),
  responseMimeType: z.string().optional(),
  responseSchema: z.custom<types.Schema>(isRecord).optional(),
  responseLogprobs: z.boolean().optional(),
  logprobs: z.number().int().optional(),
  enableEnhancedCivicAnswers: z.boolean().optional(),
});

export const clientMessageSchema = z.object({
  setup: z
    .object({
      model: z.string(),
      generationConfig: generationConfigSchema.optional(),
      systemInstruction: contentSchema.optional(),
      tools: z.array(z.custom<types.Tool>(isRecord)).optional(),
      realtimeInputConfig: z.custom<types.RealtimeInputConfig>(isRecord).optional(),
      sessionResumption: z.custom<types.SessionResumptionConfig>(isRecord).optional(),
      contextWindowCompression: z.custom<types.ContextWindowCompressionConfig>(isRecord).optional(),
      inputAudioTranscription: z.object({}).optional(),
      outputAudioTranscription: z.object({}).optional(),
    })
    .optional(),
  clientContent: z
    .object({
      turns: z.array(contentSchema).default([]),
      turnComplete: z.boolean().default(false),
    })
    .optional(),
  realtimeInput: realtimeInputSchema.optional(),
  toolResponse: z
    .object({ functionResponses: z.array(functionResponseSchema).default([]) })
    .optional(),
});
