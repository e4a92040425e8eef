import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { McpService, readInitializeParams } from '../mcp.service';
import { ToolInvoker } from '../tool.invoker';
import { InvalidEnvelopeError } from '../../../lib/errors/McpError';

describe('McpService', () => {
  let service: McpService;
  let invoker: { invoke: jest.Mock };

  beforeAll(() => Logger.overrideLogger(false));

  beforeEach(async () => {
    invoker = { invoke: jest.fn() };
    const moduleRef: TestingModule = await Test.createTestingModule({
      providers: [McpService, { provide: ToolInvoker, useValue: invoker }],
    }).compile();
    service = moduleRef.get(McpService);
  });

  describe('parseEnvelope', () => {
    it('accepts a minimal request', () => {
      expect(service.parseEnvelope({ id: 7, method: 'tools/list' })).toEqual({
        jsonrpc: '2.0',
        id: 7,
        method: 'tools/list',
        params: undefined,
      });
    });

    it.each([
      ['an object', { k: 1 }],
      ['a boolean', true],
      ['an array', [1, 'a']],
    ])('keeps %s id as sent', (_label, id) => {
      expect(service.parseEnvelope({ id, method: 'initialized' }).id).toEqual(
        id,
      );
    });

    it('defaults an absent id to null', () => {
      expect(service.parseEnvelope({ method: 'initialized' }).id).toBeNull();
    });

    it('routes a missing method as the empty method', () => {
      expect(service.parseEnvelope({ id: 'a' }).method).toBe('');
    });

    it.each([
      ['an array', []],
      ['a string', 'tools/list'],
      ['null', null],
      ['a numeric method', { id: 1, method: 5 }],
    ])('rejects %s', (_label, body) => {
      expect(() => service.parseEnvelope(body)).toThrow(InvalidEnvelopeError);
    });
  });

  it('answers initialize and remembers the client', async () => {
    const res = await service.handle({
      jsonrpc: '2.0',
      id: 1,
      method: 'initialize',
      params: {
        protocolVersion: '2024-11-05',
        clientInfo: { name: 'test-client', version: '0.1.0' },
      },
    });

    expect(res).toEqual({
      jsonrpc: '2.0',
      id: 1,
      result: {
        protocolVersion: '2024-11-05',
        capabilities: { tools: { listChanged: true } },
        serverInfo: {
          name: 'assistant-server',
          title: 'Assistant Server MCP',
          version: '1.0.0',
        },
        instructions:
          'Assistant Server MCP provides tools for managing todos, notes, preferences, and recipes.',
      },
    });
    expect(service.clientInfo).toEqual({ name: 'test-client', version: '0.1.0' });
  });

  it('rejects initialize without params', async () => {
    await expect(
      service.handle({ jsonrpc: '2.0', id: 2, method: 'initialize' }),
    ).resolves.toEqual({
      jsonrpc: '2.0',
      id: 2,
      error: { code: -32602, message: 'Invalid params' },
    });
  });

  it('acknowledges initialized', async () => {
    await expect(
      service.handle({ jsonrpc: '2.0', id: 3, method: 'initialized' }),
    ).resolves.toEqual({ jsonrpc: '2.0', id: 3, result: {} });
  });

  it('lists tools', async () => {
    const res = await service.handle({
      jsonrpc: '2.0',
      id: 4,
      method: 'tools/list',
    });
    if (!('result' in res)) throw new Error('expected a result');
    expect(res.result).toEqual({ tools: expect.any(Array) });
  });

  it('passes tools/call through to the invoker with the current client', async () => {
    invoker.invoke.mockResolvedValueOnce({
      isError: false,
      content: [{ type: 'text', text: 'ok' }],
    });
    await service.handle({
      jsonrpc: '2.0',
      id: 0,
      method: 'initialize',
      params: { clientInfo: { name: 'test-client' } },
    });

    const res = await service.handle({
      jsonrpc: '2.0',
      id: 5,
      method: 'tools/call',
      params: { name: 'list_notes', arguments: { key: 'wifi' } },
    });

    expect(res).toEqual({
      jsonrpc: '2.0',
      id: 5,
      result: { isError: false, content: [{ type: 'text', text: 'ok' }] },
    });
    expect(invoker.invoke).toHaveBeenCalledWith(
      'list_notes',
      { key: 'wifi' },
      { name: 'test-client' },
    );
  });

  it.each([
    [undefined, 'Invalid params'],
    [{ arguments: {} }, 'Tool name is required'],
    [{ name: 42 }, 'Tool name is required'],
  ])('rejects tools/call params %j', async (params, message) => {
    await expect(
      service.handle({ jsonrpc: '2.0', id: 6, method: 'tools/call', params }),
    ).resolves.toEqual({
      jsonrpc: '2.0',
      id: 6,
      error: { code: -32602, message },
    });
    expect(invoker.invoke).not.toHaveBeenCalled();
  });

  it('reports unknown methods', async () => {
    await expect(
      service.handle({ jsonrpc: '2.0', id: null, method: 'resources/list' }),
    ).resolves.toEqual({
      jsonrpc: '2.0',
      id: null,
      error: { code: -32601, message: 'Method not found' },
    });
  });
});

describe('readInitializeParams', () => {
  it('reads known fields and ignores the rest', () => {
    expect(
      readInitializeParams({
        protocolVersion: '2024-11-05',
        capabilities: {
          roots: { listChanged: true },
          sampling: {},
          experimental: { x: 1 },
        },
        clientInfo: { name: 'test-client', title: 7 },
      }),
    ).toEqual({
      protocolVersion: '2024-11-05',
      capabilities: { roots: { listChanged: true }, sampling: {} },
      clientInfo: { name: 'test-client' },
    });
  });

  it('tolerates absent sub-objects', () => {
    expect(readInitializeParams({})).toEqual({
      capabilities: {},
      clientInfo: {},
    });
  });
});
