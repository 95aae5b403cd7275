import { defineErrorModule } from '@tessera/service';

export const HttpErrors = defineErrorModule('tessera.http');

export const InvalidUrl = HttpErrors.define(1, 'InvalidUrl', 'Invalid or empty URL.');
export const RequestCreationFailed = HttpErrors.define(2, 'RequestCreationFailed', 'Failed to create HTTP request.');
export const ConnectionFailed = HttpErrors.define(3, 'ConnectionFailed', 'HTTP connection failed.');
export const NoResponse = HttpErrors.define(4, 'NoResponse', 'No HTTP response received.');
export const RequestTimeout = HttpErrors.define(5, 'RequestTimeout', 'HTTP request timed out.');
export const RequestAborted = HttpErrors.define(6, 'RequestAborted', 'HTTP request was aborted.');
export const HeaderProviderFailed = HttpErrors.define(7, 'HeaderProviderFailed', 'A header provider failed.');
