import type { RelayConfigInput } from './types';

type Section = Exclude<keyof RelayConfigInput, '$schema' | 'upstreams' | 'defaultUpstream'>;

function mergeSection<K extends Section>(
  base: RelayConfigInput,
  overlay: RelayConfigInput,
  key: K
): RelayConfigInput[K] {
  const a = base[key];
  const b = overlay[key];
  if (!a) return b;
  if (!b) return a;
  return { ...a, ...b };
}

const SECTIONS: Section[] = [
  'server',
  'streaming',
  'reconnect',
  'replies',
  'interceptors',
  'sessions',
  'shutdown',
  'logging'
];

/**
 * Merge two config inputs, last wins. Object sections merge key by key;
 * `upstreams` is replaced as a whole.
 */
export function mergeConfig(base: RelayConfigInput, overlay: RelayConfigInput): RelayConfigInput {
  const result: RelayConfigInput = {};

  const upstreams = overlay.upstreams ?? base.upstreams;
  if (upstreams) result.upstreams = upstreams;

  const defaultUpstream = overlay.defaultUpstream ?? base.defaultUpstream;
  if (defaultUpstream) result.defaultUpstream = defaultUpstream;

  for (const key of SECTIONS) {
    const merged = mergeSection(base, overlay, key);
    if (merged) Object.assign(result, { [key]: merged });
  }

  return result;
}
