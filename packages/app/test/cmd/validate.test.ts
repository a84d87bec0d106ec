import { applyDefaults } from '@mcp-relay/core/config';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { describeConfig, runValidate } from '../../src/cmd/validate';
import { type TempDir, tmpdir } from '../utils/tmpdir';

describe('describeConfig', () => {
  test('lists listen address, upstreams and blocked methods', () => {
    const config = applyDefaults({
      upstreams: [
        { name: 'remote', transport: 'http', url: 'http://localhost:3000/mcp' },
        { name: 'local', transport: 'stdio', command: ['node', 'server.js'] }
      ],
      defaultUpstream: 'local',
      interceptors: { blockMethods: ['tools/call', 'resources/*'] }
    });

    const lines = describeConfig({ config, meta: { layersApplied: [], warnings: ['Something odd'] } }, false);

    expect(lines).toEqual([
      'Config   (none found, defaults only)',
      'warn     Something odd',
      'Listen   http://127.0.0.1:4100/mcp',
      'Upstreams',
      '  remote [http] http://localhost:3000/mcp',
      '  local [stdio] node server.js (default)',
      'Blocked  tools/call, resources/*',
      'Config is valid'
    ]);
  });

  test('colors labels when asked', () => {
    const config = applyDefaults({ upstreams: [{ name: 'a', transport: 'http', url: 'http://localhost:1/mcp' }] });
    const [first] = describeConfig({ config, meta: { layersApplied: [], warnings: [] } }, true);
    expect(first).toBe('\x1b[1mConfig\x1b[0m   (none found, defaults only)');
  });
});

describe('runValidate', () => {
  let tmp: TempDir;
  let output: string[];

  beforeEach(async () => {
    tmp = await tmpdir();
    output = [];
    const capture = (...args: unknown[]) => {
      output.push(args.map(String).join(' '));
    };
    vi.spyOn(console, 'log').mockImplementation(capture);
    vi.spyOn(console, 'error').mockImplementation(capture);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await tmp.cleanup();
  });

  test('prints the resolved config as JSON', async () => {
    await tmp.writeFile(
      'mcp-relay.jsonc',
      '{ "upstreams": [{ "name": "a", "transport": "http", "url": "http://localhost:3000/mcp" }] }'
    );

    const code = await runValidate({ config: tmp.join('mcp-relay.jsonc'), json: true });

    expect(code).toBe(0);
    expect(JSON.parse(output.join('\n'))).toMatchObject({
      valid: true,
      config: { defaultUpstream: 'a', server: { port: 4100 } },
      meta: { configPath: tmp.join('mcp-relay.jsonc'), layersApplied: ['file'] }
    });
  });

  test('reports an invalid config with exit code 1', async () => {
    await tmp.writeFile('mcp-relay.jsonc', '{ "upstreams": [] }');

    const code = await runValidate({ config: tmp.join('mcp-relay.jsonc'), json: true });

    expect(code).toBe(1);
    expect(JSON.parse(output.join('\n'))).toEqual({
      valid: false,
      error: {
        code: 'CONFIG_ERROR',
        message: 'No upstream configured: add "upstreams" to mcp-relay.jsonc or pass --upstream'
      }
    });
  });
});
