import { Injectable, Logger } from '@nestjs/common';
import Ajv, {
  type ErrorObject,
  type SchemaObject,
  type ValidateFunction,
} from 'ajv';
import {
  getToolDescriptor,
  type ToolDescriptor,
  type ToolName,
} from './tool.catalog';

export type ToolArgsCheck =
  | { ok: true; args: Record<string, unknown> }
  | { ok: false; missing: string };

/** Build the validation schema for one tool from its catalog entry. */
export function buildArgsSchema(descriptor: ToolDescriptor): SchemaObject {
  const properties: Record<string, SchemaObject> = {};
  const required: string[] = [];
  for (const p of descriptor.parameters) {
    const schema: SchemaObject = { type: p.type };
    if (p.type === 'string' && p.required && !p.allowEmpty) {
      schema['minLength'] = 1;
    }
    properties[p.name] = schema;
    if (p.required) required.push(p.name);
  }
  return { type: 'object', properties, required };
}

/** Top-level argument an Ajv error is about. */
function argumentOf(error: ErrorObject): string | undefined {
  if (error.keyword === 'required') {
    const missing: unknown = error.params['missingProperty'];
    return typeof missing === 'string' ? missing : undefined;
  }
  const [, head] = error.instancePath.split('/');
  return head ? head.replace(/~1/g, '/').replace(/~0/g, '~') : undefined;
}

/**
 * One generic pass over tool arguments before any handler runs.
 *
 * Numbers and booleans are coerced where Ajv can ("3" -> 3, "true" ->
 * true). String parameters are never coerced: null, numbers and the like
 * count as not sent. A bad or missing required argument fails the call;
 * a bad optional argument is dropped as if it had not been sent.
 */
@Injectable()
export class ToolArgsValidator {
  private readonly logger = new Logger(ToolArgsValidator.name);
  private readonly ajv = new Ajv({
    strict: true,
    allErrors: true,
    useDefaults: false,
    coerceTypes: true,
  });
  private readonly cache = new Map<ToolName, ValidateFunction>();

  check(name: ToolName, raw: Readonly<Record<string, unknown>>): ToolArgsCheck {
    const descriptor = getToolDescriptor(name);
    const validate = this.compiled(descriptor);
    const args: Record<string, unknown> = { ...raw };

    const failing = new Set<string>();
    for (const p of descriptor.parameters) {
      const value = args[p.name];
      if (p.type === 'string' && value !== undefined && typeof value !== 'string') {
        failing.add(p.name);
        delete args[p.name];
      }
    }

    // Ajv coerces in place, so `args` carries the coerced values.
    const candidate: unknown = args;
    if (validate(candidate) && failing.size === 0) {
      return { ok: true, args };
    }

    for (const error of validate.errors ?? []) {
      const arg = argumentOf(error);
      if (arg !== undefined) failing.add(arg);
    }

    // Report the first required argument in catalog order.
    const missing = descriptor.parameters.find(
      (p) => p.required && failing.has(p.name),
    );
    if (missing) {
      return { ok: false, missing: missing.name };
    }

    for (const arg of failing) {
      this.logger.debug(`${name}: dropping invalid optional argument "${arg}"`);
      delete args[arg];
    }
    return { ok: true, args };
  }

  private compiled(descriptor: ToolDescriptor): ValidateFunction {
    const cached = this.cache.get(descriptor.name);
    if (cached) return cached;
    const validate = this.ajv.compile(buildArgsSchema(descriptor));
    this.cache.set(descriptor.name, validate);
    return validate;
  }
}
