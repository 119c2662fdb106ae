import type { ProviderConfig } from '../config/config.types.js';

export interface ProviderCredentials {
  apiKey: string;
  folderId: string;
}

export type ReviewMode =
  | { kind: 'online'; credentials: ProviderCredentials }
  | { kind: 'offline'; reason: 'missing-credentials' };

/** Online only when both credentials are present and non-blank. */
export function selectReviewMode(
  provider: Readonly<ProviderConfig>,
): ReviewMode {
  const apiKey = provider.apiKey?.trim() ?? '';
  const folderId = provider.folderId?.trim() ?? '';
  if (apiKey === '' || folderId === '') {
    return { kind: 'offline', reason: 'missing-credentials' };
  }
  return { kind: 'online', credentials: { apiKey, folderId } };
}
