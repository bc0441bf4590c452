/**
 * Provider Configuration Types
 *
 * Persisted settings for one configured provider instance. The enabled flag is
 * owned by the host's configuration; the router only observes it.
 */

export interface ProviderConfig {
  id: number;
  providerName: string;             // persisted identity, e.g. 'musicbrainz'
  enabled: boolean;
  apiKey?: string;
  baseUrl?: string;
  options?: Record<string, unknown>;    // Provider-specific options
  created_at: Date;
  updated_at: Date;
}

export interface TestConnectionResponse {
  success: boolean;
  message?: string;
  error?: string;
}
