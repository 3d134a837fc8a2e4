import fs from 'node:fs';
import path from 'node:path';
import config from 'config';

export type AppConfig = {
  name: string;
  timeZone: string;
};

export type LoggingConfig = {
  level: string;
};

export type ServerConfig = {
  host: string;
  port: number;
};

export type EventsConfig = {
  defaultPastMinutes: number;
  defaultFutureMinutes: number;
};

export type StatusConfig = {
  logIntervalSeconds: number;
};

export type ProtectConfig = {
  address: string;
  username: string;
  password: string;
};

export type ExportConfig = {
  command: string;
  args?: string[];
  extraArgs?: string[];
  downloadsDir: string;
  maxRetries: number;
  retryDelaySeconds: number;
  timeoutSeconds: number;
  forceKillTimeoutMs?: number;
};

export type CombineConfig = {
  enabled: boolean;
  keepSplitFiles: boolean;
  toleranceMs: number;
  ffmpegPath?: string;
};

export type ClipwardenConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  server: ServerConfig;
  events: EventsConfig;
  status: StatusConfig;
  protect: ProtectConfig;
  export: ExportConfig;
  combine: CombineConfig;
};

type JsonType = 'object' | 'number' | 'string' | 'boolean' | 'array';

type JsonSchema = {
  type: JsonType | JsonType[];
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean | JsonSchema;
  items?: JsonSchema;
  enum?: (string | number | boolean)[];
  minimum?: number;
  maximum?: number;
  integer?: boolean;
};

const stringArraySchema: JsonSchema = {
  type: 'array',
  items: { type: 'string' }
};

const clipwardenConfigSchema: JsonSchema = {
  type: 'object',
  required: ['app', 'logging', 'server', 'events', 'status', 'protect', 'export', 'combine'],
  additionalProperties: false,
  properties: {
    app: {
      type: 'object',
      required: ['name', 'timeZone'],
      additionalProperties: false,
      properties: {
        name: { type: 'string' },
        timeZone: { type: 'string' }
      }
    },
    logging: {
      type: 'object',
      required: ['level'],
      additionalProperties: false,
      properties: {
        level: { type: 'string' }
      }
    },
    server: {
      type: 'object',
      required: ['host', 'port'],
      additionalProperties: false,
      properties: {
        host: { type: 'string' },
        port: { type: 'number', minimum: 0, maximum: 65535, integer: true }
      }
    },
    events: {
      type: 'object',
      required: ['defaultPastMinutes', 'defaultFutureMinutes'],
      additionalProperties: false,
      properties: {
        defaultPastMinutes: { type: 'number', minimum: 0 },
        defaultFutureMinutes: { type: 'number', minimum: 0 }
      }
    },
    status: {
      type: 'object',
      required: ['logIntervalSeconds'],
      additionalProperties: false,
      properties: {
        logIntervalSeconds: { type: 'number', minimum: 0 }
      }
    },
    protect: {
      type: 'object',
      required: ['address', 'username', 'password'],
      additionalProperties: false,
      properties: {
        address: { type: 'string' },
        username: { type: 'string' },
        password: { type: 'string' }
      }
    },
    export: {
      type: 'object',
      required: ['command', 'downloadsDir', 'maxRetries', 'retryDelaySeconds', 'timeoutSeconds'],
      additionalProperties: false,
      properties: {
        command: { type: 'string' },
        args: stringArraySchema,
        extraArgs: stringArraySchema,
        downloadsDir: { type: 'string' },
        maxRetries: { type: 'number', minimum: 1, integer: true },
        retryDelaySeconds: { type: 'number', minimum: 0 },
        timeoutSeconds: { type: 'number', minimum: 0 },
        forceKillTimeoutMs: { type: 'number', minimum: 0 }
      }
    },
    combine: {
      type: 'object',
      required: ['enabled', 'keepSplitFiles', 'toleranceMs'],
      additionalProperties: false,
      properties: {
        enabled: { type: 'boolean' },
        keepSplitFiles: { type: 'boolean' },
        toleranceMs: { type: 'number', minimum: 0 },
        ffmpegPath: { type: 'string' }
      }
    }
  }
};

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  const types = Array.isArray(schema.type) ? schema.type : [schema.type];
  const results = types.map(type => validateAgainstSchemaForType(type, schema, value, pathLabel));

  if (results.some(errors => errors.length === 0)) {
    return [];
  }

  return results[0] ?? [];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateAgainstSchemaForType(
  type: JsonType,
  schema: JsonSchema,
  value: unknown,
  pathLabel: string
): string[] {
  const errors: string[] = [];

  if (type === 'object') {
    if (!isRecord(value)) {
      errors.push(`${pathLabel} must be an object`);
      return errors;
    }

    for (const key of schema.required ?? []) {
      if (!(key in value)) {
        errors.push(`${pathLabel}.${key} is required`);
      }
    }

    const definedProperties = new Set(Object.keys(schema.properties ?? {}));
    const additional = schema.additionalProperties;
    if (additional === false) {
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(`${pathLabel}.${key} is not allowed`);
        }
      }
    } else if (additional && typeof additional === 'object') {
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(...validateAgainstSchema(additional, value[key], `${pathLabel}.${key}`));
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

  if (type === 'array') {
    if (!Array.isArray(value)) {
      errors.push(`${pathLabel} must be an array`);
      return errors;
    }

    const itemSchema = schema.items;
    if (itemSchema) {
      value.forEach((item, index) => {
        errors.push(...validateAgainstSchema(itemSchema, item, `${pathLabel}[${index}]`));
      });
    }

    return errors;
  }

  if (type === 'number') {
    if (typeof value !== 'number' || Number.isNaN(value)) {
      errors.push(`${pathLabel} must be a number`);
      return errors;
    }

    if (schema.integer && !Number.isInteger(value)) {
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

  if (typeof value !== 'boolean') {
    errors.push(`${pathLabel} must be a boolean`);
  }
  return errors;
}

export function validateConfig(value: unknown): asserts value is ClipwardenConfig {
  const errors = validateAgainstSchema(clipwardenConfigSchema, value, 'config');
  if (errors.length > 0) {
    throw new Error(errors.join('; '));
  }
}

function validateLogicalConfig(value: ClipwardenConfig) {
  const messages: string[] = [];

  if (!isKnownTimeZone(value.app.timeZone)) {
    messages.push(`config.app.timeZone "${value.app.timeZone}" is not a known IANA time zone`);
  }

  if (value.export.command.trim().length === 0) {
    messages.push('config.export.command must be a non-empty string');
  }

  if (value.export.downloadsDir.trim().length === 0) {
    messages.push('config.export.downloadsDir must be a non-empty string');
  }

  if (messages.length > 0) {
    throw new Error(messages.join('; '));
  }
}

/**
 * Credentials for the export command are only needed by the running service,
 * so they are checked at startup rather than on every parse.
 */
export function assertExporterCredentials(value: ClipwardenConfig) {
  const missing = (['address', 'username', 'password'] as const).filter(
    key => value.protect[key].trim().length === 0
  );
  if (missing.length > 0) {
    throw new Error(
      `Missing exporter credentials: ${missing.map(key => `config.protect.${key}`).join(', ')}`
    );
  }
}

function isKnownTimeZone(timeZone: string) {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

export function parseConfig(contents: string): ClipwardenConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse configuration: ${message}`);
  }

  return checkConfig(parsed);
}

export function checkConfig(value: unknown): ClipwardenConfig {
  validateConfig(value);
  validateLogicalConfig(value);
  return value;
}

export function loadConfigFromFile(filePath: string): ClipwardenConfig {
  const resolvedPath = path.resolve(filePath);
  const contents = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(contents);
}

/** Reads the layered `config` directory (defaults, NODE_ENV file, environment variables). */
export function loadConfig(): ClipwardenConfig {
  const loaded: unknown = config.util.toObject(config);
  return checkConfig(loaded);
}

export { clipwardenConfigSchema };
