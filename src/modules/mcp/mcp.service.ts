import { Injectable, Logger } from '@nestjs/common';
import { InvalidEnvelopeError } from '../../lib/errors/McpError';
import { listTools } from './tool.catalog';
import { ToolInvoker } from './tool.invoker';
import {
  JSON_RPC_INVALID_PARAMS,
  JSON_RPC_METHOD_NOT_FOUND,
  type ClientCapabilities,
  type ClientInfo,
  type InitializeParams,
  type InitializeResult,
  type JsonRpcId,
  type JsonRpcRequest,
  type JsonRpcResponse,
} from './types';

export const PROTOCOL_VERSION = '2024-11-05';

export const SERVER_INFO = {
  name: 'assistant-server',
  title: 'Assistant Server MCP',
  version: '1.0.0',
} as const;

export const SERVER_INSTRUCTIONS =
  'Assistant Server MCP provides tools for managing todos, notes, preferences, and recipes.';

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function optionalString(v: unknown): string | undefined {
  return typeof v === 'string' ? v : undefined;
}

function readId(raw: unknown): JsonRpcId {
  return raw === undefined ? null : raw;
}

function ok(id: JsonRpcId, result: unknown): JsonRpcResponse {
  return { jsonrpc: '2.0', id, result };
}

function fail(id: JsonRpcId, code: number, message: string): JsonRpcResponse {
  return { jsonrpc: '2.0', id, error: { code, message } };
}

/** Best-effort read of `initialize` params; unknown fields are ignored. */
export function readInitializeParams(
  params: Record<string, unknown>,
): InitializeParams {
  const clientInfo: ClientInfo = {};
  const rawClient = params['clientInfo'];
  if (isRecord(rawClient)) {
    const name = optionalString(rawClient['name']);
    const title = optionalString(rawClient['title']);
    const version = optionalString(rawClient['version']);
    if (name !== undefined) clientInfo.name = name;
    if (title !== undefined) clientInfo.title = title;
    if (version !== undefined) clientInfo.version = version;
  }

  const capabilities: ClientCapabilities = {};
  const rawCaps = params['capabilities'];
  if (isRecord(rawCaps)) {
    const roots = rawCaps['roots'];
    const listChanged = isRecord(roots) ? roots['listChanged'] : undefined;
    if (typeof listChanged === 'boolean') {
      capabilities.roots = { listChanged };
    }
    const sampling = rawCaps['sampling'];
    if (isRecord(sampling)) capabilities.sampling = sampling;
    const elicitation = rawCaps['elicitation'];
    if (isRecord(elicitation)) capabilities.elicitation = elicitation;
  }

  const protocolVersion = optionalString(params['protocolVersion']);
  return protocolVersion === undefined
    ? { capabilities, clientInfo }
    : { protocolVersion, capabilities, clientInfo };
}

/**
 * JSON-RPC dispatcher for the MCP endpoint. Protocol problems become
 * JSON-RPC errors; tool failures stay inside a successful result.
 */
@Injectable()
export class McpService {
  private readonly logger = new Logger(McpService.name);
  private client: ClientInfo | undefined;

  constructor(private readonly invoker: ToolInvoker) {}

  /** Client from the most recent `initialize`. */
  get clientInfo(): ClientInfo | undefined {
    return this.client;
  }

  /** Throws InvalidEnvelopeError when no response can be addressed. */
  parseEnvelope(body: unknown): JsonRpcRequest {
    if (!isRecord(body)) {
      throw new InvalidEnvelopeError('body must be a JSON object');
    }
    const rawMethod = body['method'];
    let method = '';
    if (typeof rawMethod === 'string') {
      method = rawMethod;
    } else if (rawMethod !== undefined) {
      throw new InvalidEnvelopeError('method must be a string');
    }
    return {
      jsonrpc: '2.0',
      id: readId(body['id']),
      method,
      params: body['params'],
    };
  }

  async handle(req: JsonRpcRequest): Promise<JsonRpcResponse> {
    switch (req.method) {
      case 'initialize':
        return this.initialize(req);
      case 'initialized':
      case 'notifications/initialized':
        return ok(req.id, {});
      case 'tools/list':
        return ok(req.id, { tools: listTools() });
      case 'tools/call':
        return this.callTool(req);
      default:
        this.logger.debug(`Method not found: "${req.method}"`);
        return fail(req.id, JSON_RPC_METHOD_NOT_FOUND, 'Method not found');
    }
  }

  private initialize(req: JsonRpcRequest): JsonRpcResponse {
    if (!isRecord(req.params)) {
      return fail(req.id, JSON_RPC_INVALID_PARAMS, 'Invalid params');
    }
    const params = readInitializeParams(req.params);
    this.client = params.clientInfo;
    this.logger.log(
      `MCP client initialized: name=${params.clientInfo.name ?? ''} version=${params.clientInfo.version ?? ''} protocol=${params.protocolVersion ?? ''}`,
    );
    const result: InitializeResult = {
      protocolVersion: PROTOCOL_VERSION,
      capabilities: { tools: { listChanged: true } },
      serverInfo: { ...SERVER_INFO },
      instructions: SERVER_INSTRUCTIONS,
    };
    return ok(req.id, result);
  }

  private async callTool(req: JsonRpcRequest): Promise<JsonRpcResponse> {
    if (!isRecord(req.params)) {
      return fail(req.id, JSON_RPC_INVALID_PARAMS, 'Invalid params');
    }
    const name = req.params['name'];
    if (typeof name !== 'string') {
      return fail(req.id, JSON_RPC_INVALID_PARAMS, 'Tool name is required');
    }
    const result = await this.invoker.invoke(
      name,
      req.params['arguments'],
      this.client,
    );
    return ok(req.id, result);
  }
}
