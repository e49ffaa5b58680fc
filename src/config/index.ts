import fs from 'node:fs';
import path from 'node:path';
import config from 'config';

export type AppConfig = {
  name: string;
};

export type LoggingConfig = {
  level: string;
};

export type PrtgConfig = {
  server: string;
  username: string;
  /** Forwarded verbatim as the `passhash` query parameter. */
  password: string;
  timeoutMs: number;
};

/**
 * `skip` waits for the next interval boundary after an overrun, `queue`
 * starts the next refresh as soon as the late one finishes.
 */
export type OverlapPolicy = 'skip' | 'queue';

export type ExporterConfig = {
  host: string;
  port: number;
  metricsPath: string;
  refreshIntervalSeconds: number;
  overlapPolicy: OverlapPolicy;
  staleAfterCycles: number;
};

export type PrtgExporterConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  prtg: PrtgConfig;
  exporter: ExporterConfig;
};

type JsonType = 'object' | 'number' | 'integer' | 'string' | 'boolean';

type JsonSchema = {
  type: JsonType | JsonType[];
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean;
  enum?: (string | number | boolean)[];
  minimum?: number;
  maximum?: number;
};

const OVERLAP_POLICIES: OverlapPolicy[] = ['skip', 'queue'];

const exporterConfigSchema: JsonSchema = {
  type: 'object',
  required: ['app', 'logging', 'prtg', 'exporter'],
  additionalProperties: false,
  properties: {
    app: {
      type: 'object',
      required: ['name'],
      additionalProperties: false,
      properties: {
        name: { type: 'string' }
      }
    },
    logging: {
      type: 'object',
      required: ['level'],
      additionalProperties: false,
      properties: {
        level: {
          type: 'string',
          enum: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']
        }
      }
    },
    prtg: {
      type: 'object',
      required: ['server', 'username', 'password', 'timeoutMs'],
      additionalProperties: false,
      properties: {
        server: { type: 'string' },
        username: { type: 'string' },
        password: { type: 'string' },
        timeoutMs: { type: 'integer', minimum: 1 }
      }
    },
    exporter: {
      type: 'object',
      required: [
        'host',
        'port',
        'metricsPath',
        'refreshIntervalSeconds',
        'overlapPolicy',
        'staleAfterCycles'
      ],
      additionalProperties: false,
      properties: {
        host: { type: 'string' },
        port: { type: 'integer', minimum: 0, maximum: 65535 },
        metricsPath: { type: 'string' },
        refreshIntervalSeconds: { type: 'number', minimum: 1 },
        overlapPolicy: { type: 'string', enum: OVERLAP_POLICIES },
        staleAfterCycles: { type: 'integer', minimum: 0 }
      }
    }
  }
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  const types = Array.isArray(schema.type) ? schema.type : [schema.type];
  const results = types.map(type => validateAgainstSchemaForType(type, schema, value, pathLabel));

  if (results.some(errors => errors.length === 0)) {
    return [];
  }

  return results[0] ?? [];
}

function validateAgainstSchemaForType(
  type: JsonType,
  schema: JsonSchema,
  value: unknown,
  pathLabel: string
): string[] {
  const errors: string[] = [];

  if (type === 'object') {
    if (!isPlainObject(value)) {
      errors.push(`${pathLabel} must be an object`);
      return errors;
    }

    const required = schema.required ?? [];

    for (const key of required) {
      if (!(key in value)) {
        errors.push(`${pathLabel}.${key} is required`);
      }
    }

    if (schema.additionalProperties === false) {
      const definedProperties = new Set(Object.keys(schema.properties ?? {}));
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(`${pathLabel}.${key} is not allowed`);
        }
      }
    }

    for (const [key, childSchema] of Object.entries(schema.properties ?? {})) {
      if (!(key in value)) {
        continue;
      }
      errors.push(...validateAgainstSchema(childSchema, value[key], `${pathLabel}.${key}`));
    }

    return errors;
  }

  if (type === 'number' || type === 'integer') {
    if (typeof value !== 'number' || Number.isNaN(value)) {
      errors.push(`${pathLabel} must be a number`);
      return errors;
    }

    if (type === 'integer' && !Number.isInteger(value)) {
      errors.push(`${pathLabel} must be an integer`);
    }

    if (typeof schema.minimum === 'number' && value < schema.minimum) {
      errors.push(`${pathLabel} must be >= ${schema.minimum}`);
    }

    if (typeof schema.maximum === 'number' && value > schema.maximum) {
      errors.push(`${pathLabel} must be <= ${schema.maximum}`);
    }

    return errors;
  }

  if (type === 'string') {
    if (typeof value !== 'string') {
      errors.push(`${pathLabel} must be a string`);
      return errors;
    }

    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
    }

    return errors;
  }

  if (type === 'boolean') {
    if (typeof value !== 'boolean') {
      errors.push(`${pathLabel} must be a boolean`);
    }
    return errors;
  }

  return errors;
}

function assertSchema(config: unknown): asserts config is PrtgExporterConfig {
  const errors = validateAgainstSchema(exporterConfigSchema, config, 'config');
  if (errors.length > 0) {
    throw new Error(errors.join('; '));
  }
}

export function validateConfig(config: unknown): asserts config is PrtgExporterConfig {
  assertSchema(config);
  validateLogicalConfig(config);
}

function validateLogicalConfig(config: PrtgExporterConfig) {
  const messages: string[] = [];

  const server = config.prtg.server.trim();
  if (!server) {
    messages.push('config.prtg.server must be set');
  } else {
    let protocol: string | null = null;
    try {
      protocol = new URL(server).protocol;
    } catch {
      messages.push(`config.prtg.server "${server}" is not a valid URL`);
    }
    if (protocol !== null && protocol !== 'http:' && protocol !== 'https:') {
      messages.push('config.prtg.server must use http or https');
    }
  }

  if (!config.exporter.metricsPath.startsWith('/')) {
    messages.push('config.exporter.metricsPath must start with "/"');
  }

  if (messages.length > 0) {
    throw new Error(messages.join('; '));
  }
}

/** Parses a JSON configuration file and layers it over the node-config defaults. */
export function parseConfig(contents: string): PrtgExporterConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse configuration: ${message}`);
  }

  const merged: unknown = isPlainObject(parsed)
    ? config.util.extendDeep({}, config.util.toObject(config), parsed)
    : parsed;
  validateConfig(merged);
  return merged;
}

export function loadConfigFromFile(filePath: string): PrtgExporterConfig {
  const resolvedPath = path.resolve(filePath);
  const contents = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(contents);
}

/**
 * Reads the layered node-config sources (`config/default.json`, the
 * NODE_ENV file and the environment variable mapping) and validates them.
 */
export function loadExporterConfig(): PrtgExporterConfig {
  const loaded: unknown = config.util.toObject(config);
  validateConfig(loaded);
  return loaded;
}
