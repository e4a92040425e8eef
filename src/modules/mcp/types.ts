/**
 * JSON-RPC 2.0 envelope and MCP payload shapes served on POST /mcp.
 */

/** Echoed back verbatim; any decoded JSON value is accepted. */
export type JsonRpcId = unknown;

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id: JsonRpcId;
  method: string;
  params?: unknown;
}

export interface JsonRpcErrorObject {
  code: number;
  message: string;
}

export type JsonRpcResponse =
  | { jsonrpc: '2.0'; id: JsonRpcId; result: unknown }
  | { jsonrpc: '2.0'; id: JsonRpcId; error: JsonRpcErrorObject };

export const JSON_RPC_METHOD_NOT_FOUND = -32601;
export const JSON_RPC_INVALID_PARAMS = -32602;

export interface TextContent {
  type: 'text';
  text: string;
}

/** Uniform envelope every tool produces. */
export interface ToolCallResult {
  isError: boolean;
  content: TextContent[];
}

export interface ClientInfo {
  name?: string;
  title?: string;
  version?: string;
}

export interface ClientCapabilities {
  roots?: { listChanged: boolean };
  sampling?: Record<string, unknown>;
  elicitation?: Record<string, unknown>;
}

export interface InitializeParams {
  protocolVersion?: string;
  capabilities: ClientCapabilities;
  clientInfo: ClientInfo;
}

export interface ServerInfo {
  name: string;
  title: string;
  version: string;
}

export interface InitializeResult {
  protocolVersion: string;
  capabilities: { tools: { listChanged: boolean } };
  serverInfo: ServerInfo;
  instructions: string;
}
