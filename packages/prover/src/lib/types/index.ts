// SPDX-License-Identifier: Apache-2.0

export * from './proof';
export * from './schemas';
export * from './transaction';
