/**
 * Context manifest: the JSON form of a BuildContext.
 *
 * `BuildContext.toJSON()` produces it; {@link loadContextManifest} reads it
 * back after checking its shape with ajv. Used by `dockwright stage
 * --manifest=<file>` to stage a context recorded by an earlier run.
 */

import _Ajv, { type ErrorObject } from 'ajv';
// ajv ESM interop: default export is the constructor
const Ajv = _Ajv.default ?? _Ajv;

import { BuildContext, type ContextEntry } from './build-context.js';
import { InvalidPathError } from './errors.js';
import type { Logger } from './logger.js';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export const CONTEXT_MANIFEST_SCHEMA = {
  type: 'object' as const,
  required: ['entries'],
  additionalProperties: false,
  properties: {
    contextRoot: { type: 'string', minLength: 1 },
    entries: {
      type: 'array',
      items: {
        type: 'object',
        required: ['contextPath', 'hostPath'],
        additionalProperties: false,
        properties: {
          contextPath: { type: 'string', minLength: 1 },
          hostPath: { type: 'string', minLength: 1 },
        },
      },
    },
  },
};

export interface ContextManifest {
  contextRoot?: string;
  entries: ContextEntry[];
}

const ajv = new Ajv({ allErrors: true, strict: false });
const validateManifest = ajv.compile<ContextManifest>(CONTEXT_MANIFEST_SCHEMA);

function formatErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) return 'unknown schema violation';
  return errors
    .map((e) => `${e.instancePath.length > 0 ? e.instancePath : '/'} ${e.message ?? 'is invalid'}`)
    .join('; ');
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Validate a parsed manifest object.
 *
 * @throws InvalidPathError listing every schema violation.
 */
export function parseContextManifest(raw: unknown): ContextManifest {
  if (!validateManifest(raw)) {
    throw new InvalidPathError(
      `Invalid context manifest: ${formatErrors(validateManifest.errors)}`,
    );
  }
  return raw;
}

/** Parse manifest JSON text into a BuildContext. */
export function loadContextManifest(text: string, logger?: Logger): BuildContext {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new InvalidPathError(`Context manifest is not valid JSON: ${detail}`);
  }

  const manifest = parseContextManifest(raw);
  return BuildContext.fromEntries(manifest.entries, {
    contextRoot: manifest.contextRoot,
    logger,
  });
}
