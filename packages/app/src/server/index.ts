export type { ServerConfig } from './app';
export { createApp } from './app';
export { getStatusForError, type HttpErrorStatus } from './errors';
export { healthRoute } from './openapi';
export * from './schemas';
export { createStdioClient, type StdioClient, type StdioClientConfig } from './stdio';
