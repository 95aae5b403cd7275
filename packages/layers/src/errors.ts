import { defineErrorModule } from '@tessera/service';

export const LayerErrors = defineErrorModule('tessera.layers');

export const RateLimitTimeout = LayerErrors.define(1, 'RateLimitTimeout', 'Timed out waiting for a rate limit token.');
export const NoTokenAvailable = LayerErrors.define(2, 'NoTokenAvailable', 'No rate limit token is available.');
