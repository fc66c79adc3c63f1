// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0

/** Version of the BidiGenerateContent API this client speaks. */
export const apiVersion = 'v1beta';

export const version = '0.1.0';
