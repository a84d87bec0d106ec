export { createFetchTransport, type FetchLike } from './fetch-transport';
export type { Transport, TransportContext } from './types';
