// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
export {
  RestClient,
  type Candidate,
  type GenerateContentApi,
  type GenerateContentRequest,
  type GenerateContentResult,
  type RestClientOptions,
} from './client.js';
