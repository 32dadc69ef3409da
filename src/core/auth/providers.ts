// src/core/auth/providers.ts

import type { ProviderPreset } from './types';

export interface ProviderEndpoints {
  authorizationEndpoint: string;
  tokenEndpoint: string;
  apiBaseUrl?: string;
}

export const PROVIDER_PRESETS: Record<ProviderPreset, ProviderEndpoints> = {
  spotify: {
    authorizationEndpoint: 'https://accounts.spotify.com/authorize',
    tokenEndpoint: 'https://accounts.spotify.com/api/token',
    apiBaseUrl: 'https://api.spotify.com/v1',
  },
};
