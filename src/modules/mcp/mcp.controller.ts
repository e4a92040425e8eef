import {
  BadRequestException,
  Body,
  Controller,
  HttpCode,
  Post,
} from '@nestjs/common';
import { McpService } from './mcp.service';
import { InvalidEnvelopeError } from '../../lib/errors/McpError';
import type { JsonRpcRequest, JsonRpcResponse } from './types';

@Controller('mcp')
export class McpController {
  constructor(private readonly mcp: McpService) {}

  /** Single JSON-RPC endpoint. Always 200 once the envelope decodes. */
  @Post()
  @HttpCode(200)
  async handle(@Body() body: unknown): Promise<JsonRpcResponse> {
    let req: JsonRpcRequest;
    try {
      req = this.mcp.parseEnvelope(body);
    } catch (err) {
      if (err instanceof InvalidEnvelopeError) {
        throw new BadRequestException('Invalid JSON-RPC request');
      }
      throw err;
    }
    return this.mcp.handle(req);
  }
}
