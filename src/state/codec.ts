/**
 * State Document Codec
 *
 * Converts between `state pull` text and the in-memory StateDocument.
 * Fields the engine does not model are carried in `extra` and written back
 * after the known ones, so documents from newer tool versions survive a
 * split unchanged.
 */

import { randomUUID } from 'node:crypto';
import { LosslessNumber, isLosslessNumber, parse, stringify } from 'lossless-json';

import { parseModulePath, formatModulePath } from '../core/address.js';
import { AddressError, ParseError } from '../core/errors.js';
import type {
  EachMode,
  JsonObject,
  JsonValue,
  ResourceEntry,
  ResourceInstance,
  StateDocument,
} from './types.js';

/**
 * State format version written for newly created documents
 */
export const STATE_FORMAT_VERSION = 4;

const DOCUMENT_FIELDS = ['version', 'terraform_version', 'serial', 'lineage', 'outputs', 'resources'];
const RESOURCE_FIELDS = ['module', 'mode', 'type', 'name', 'each', 'provider', 'instances'];
const INSTANCE_FIELDS = [
  'index_key',
  'deposed',
  'attributes',
  'sensitive_attributes',
  'private',
  'dependencies',
];

// =============================================================================
// Guards
// =============================================================================

export function isJsonObject(value: unknown): value is JsonObject {
  return (
    typeof value === 'object' && value !== null && !Array.isArray(value) && !isLosslessNumber(value)
  );
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

// Plain assignment to "__proto__" would replace the prototype instead of adding a field
function setField(target: JsonObject, key: string, value: JsonValue): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

function pickExtra(source: JsonObject, known: string[]): JsonObject {
  const extra: JsonObject = {};
  for (const [key, value] of Object.entries(source)) {
    if (!known.includes(key)) {
      setField(extra, key, value);
    }
  }
  return extra;
}

/**
 * Keep a number as a JS number only when writing it back gives the same text.
 *
 * Anything else (integers beyond 2^53, `1.10`, `1e3`) stays a LosslessNumber
 * holding the original spelling.
 */
function parseNumberExact(value: string): number | LosslessNumber {
  const number = Number(value);
  return String(number) === value ? number : new LosslessNumber(value);
}

// =============================================================================
// Decode
// =============================================================================

/**
 * Parse `state pull` output into a StateDocument.
 *
 * @throws ParseError if the text is not JSON or is missing required fields
 */
export function decodeState(text: string): StateDocument {
  let raw: unknown;
  try {
    raw = parse(text, null, parseNumberExact);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ParseError(`State is not valid JSON: ${reason}`);
  }

  if (!isJsonObject(raw)) {
    throw new ParseError('State must be a JSON object');
  }

  const { version, terraform_version, serial, lineage, outputs, resources } = raw;

  if (!isNonNegativeInteger(version)) {
    throw new ParseError('State field "version" must be a non-negative integer');
  }
  if (typeof terraform_version !== 'string') {
    throw new ParseError('State field "terraform_version" must be a string');
  }
  if (!isNonNegativeInteger(serial)) {
    throw new ParseError('State field "serial" must be a non-negative integer');
  }
  if (typeof lineage !== 'string') {
    throw new ParseError('State field "lineage" must be a string');
  }
  if (outputs !== undefined && !isJsonObject(outputs)) {
    throw new ParseError('State field "outputs" must be an object');
  }
  if (!Array.isArray(resources)) {
    throw new ParseError('State field "resources" must be an array');
  }

  const document: StateDocument = {
    version,
    terraformVersion: terraform_version,
    serial,
    lineage,
    resources: resources.map((resource, index) => decodeResource(resource, index)),
    extra: pickExtra(raw, DOCUMENT_FIELDS),
  };
  if (outputs !== undefined) {
    document.outputs = outputs;
  }
  return document;
}

function decodeResource(raw: JsonValue, index: number): ResourceEntry {
  const where = `resources[${index}]`;
  if (!isJsonObject(raw)) {
    throw new ParseError(`${where} must be an object`);
  }

  const { module, mode, type, name, each, provider, instances } = raw;

  if (mode !== 'managed' && mode !== 'data') {
    throw new ParseError(`${where}.mode must be "managed" or "data"`);
  }
  if (typeof type !== 'string' || typeof name !== 'string') {
    throw new ParseError(`${where} must have string "type" and "name"`);
  }
  if (typeof provider !== 'string') {
    throw new ParseError(`${where}.provider must be a string`);
  }
  if (!Array.isArray(instances)) {
    throw new ParseError(`${where}.instances must be an array`);
  }

  return {
    module: decodeModule(module, where),
    mode,
    type,
    name,
    provider,
    each: decodeEach(each, where),
    instances: instances.map((instance, i) => decodeInstance(instance, `${where}.instances[${i}]`)),
    extra: pickExtra(raw, RESOURCE_FIELDS),
  };
}

function decodeModule(raw: JsonValue | undefined, where: string): string[] {
  if (raw === undefined) {
    return [];
  }
  if (typeof raw !== 'string') {
    throw new ParseError(`${where}.module must be a string`);
  }
  try {
    return [...parseModulePath(raw)];
  } catch (error) {
    if (error instanceof AddressError) {
      throw new ParseError(`${where}.module: ${error.message}`);
    }
    throw error;
  }
}

function decodeEach(raw: JsonValue | undefined, where: string): EachMode {
  if (raw === undefined) {
    return 'none';
  }
  if (raw === 'list' || raw === 'map') {
    return raw;
  }
  throw new ParseError(`${where}.each must be "list" or "map"`);
}

function decodeInstance(raw: JsonValue, where: string): ResourceInstance {
  if (!isJsonObject(raw)) {
    throw new ParseError(`${where} must be an object`);
  }

  const instance: ResourceInstance = { extra: pickExtra(raw, INSTANCE_FIELDS) };
  const { index_key, deposed, attributes, sensitive_attributes, private: privateBlob, dependencies } = raw;

  if (index_key !== undefined) {
    if (typeof index_key !== 'number' && typeof index_key !== 'string') {
      throw new ParseError(`${where}.index_key must be a number or a string`);
    }
    instance.indexKey = index_key;
  }
  if (deposed !== undefined) {
    if (typeof deposed !== 'string') {
      throw new ParseError(`${where}.deposed must be a string`);
    }
    instance.deposed = deposed;
  }
  if (attributes !== undefined) {
    if (!isJsonObject(attributes)) {
      throw new ParseError(`${where}.attributes must be an object`);
    }
    instance.attributes = attributes;
  }
  if (sensitive_attributes !== undefined) {
    instance.sensitiveAttributes = sensitive_attributes;
  }
  if (privateBlob !== undefined) {
    if (typeof privateBlob !== 'string') {
      throw new ParseError(`${where}.private must be a string`);
    }
    instance.private = privateBlob;
  }
  if (dependencies !== undefined) {
    if (!Array.isArray(dependencies)) {
      throw new ParseError(`${where}.dependencies must be an array`);
    }
    instance.dependencies = dependencies.map((dependency) => {
      if (typeof dependency !== 'string') {
        throw new ParseError(`${where}.dependencies must contain only strings`);
      }
      return dependency;
    });
  }

  return instance;
}

// =============================================================================
// Encode
// =============================================================================

/**
 * Serialize a StateDocument to the text `state push` accepts.
 *
 * Known fields come first in the order the tool writes them, then unknown
 * fields in the order they were read.
 */
export function encodeState(document: StateDocument): string {
  const text = stringify(toWire(document), undefined, 2);
  if (text === undefined) {
    throw new Error('State document could not be serialized');
  }
  return `${text}\n`;
}

/**
 * Convert a StateDocument to its wire-format object.
 */
export function toWire(document: StateDocument): JsonObject {
  const wire: JsonObject = {
    version: document.version,
    terraform_version: document.terraformVersion,
    serial: document.serial,
    lineage: document.lineage,
  };
  if (document.outputs !== undefined) {
    wire['outputs'] = document.outputs;
  }
  wire['resources'] = document.resources.map(resourceToWire);
  return { ...wire, ...document.extra };
}

function resourceToWire(resource: ResourceEntry): JsonObject {
  const wire: JsonObject = {};
  if (resource.module.length > 0) {
    wire['module'] = formatModulePath(resource.module);
  }
  wire['mode'] = resource.mode;
  wire['type'] = resource.type;
  wire['name'] = resource.name;
  if (resource.each !== 'none') {
    wire['each'] = resource.each;
  }
  wire['provider'] = resource.provider;
  wire['instances'] = resource.instances.map(instanceToWire);
  return { ...wire, ...resource.extra };
}

function instanceToWire(instance: ResourceInstance): JsonObject {
  const wire: JsonObject = {};
  if (instance.indexKey !== undefined) {
    wire['index_key'] = instance.indexKey;
  }
  if (instance.deposed !== undefined) {
    wire['deposed'] = instance.deposed;
  }
  // schema_version and status sit between the key and the attributes on the wire
  const { schema_version, status, ...rest } = instance.extra;
  if (status !== undefined) {
    wire['status'] = status;
  }
  if (schema_version !== undefined) {
    wire['schema_version'] = schema_version;
  }
  if (instance.attributes !== undefined) {
    wire['attributes'] = instance.attributes;
  }
  if (instance.sensitiveAttributes !== undefined) {
    wire['sensitive_attributes'] = instance.sensitiveAttributes;
  }
  if (instance.private !== undefined) {
    wire['private'] = instance.private;
  }
  if (instance.dependencies !== undefined) {
    wire['dependencies'] = instance.dependencies;
  }
  return { ...wire, ...rest };
}

// =============================================================================
// Construction
// =============================================================================

/**
 * Options for creating an empty state document
 */
export interface CreateEmptyStateOptions {
  /** Tool version recorded in the new document */
  terraformVersion: string;
  /** Lineage for the new history line (default: a fresh UUID) */
  lineage?: string;
}

/**
 * Create an empty state document for a backend that has no state yet.
 *
 * The document starts at serial 0 with its own lineage, so its first push
 * carries serial 1.
 */
export function createEmptyState(options: CreateEmptyStateOptions): StateDocument {
  return {
    version: STATE_FORMAT_VERSION,
    terraformVersion: options.terraformVersion,
    serial: 0,
    lineage: options.lineage ?? randomUUID(),
    outputs: {},
    resources: [],
    extra: {},
  };
}

// =============================================================================
// Copying
// =============================================================================

/**
 * Deep copy a JSON value. Primitives and LosslessNumbers are immutable and shared.
 */
export function cloneJson(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map(cloneJson);
  }
  if (isJsonObject(value)) {
    return cloneJsonObject(value);
  }
  return value;
}

function cloneJsonObject(source: JsonObject): JsonObject {
  const copy: JsonObject = {};
  for (const [key, value] of Object.entries(source)) {
    setField(copy, key, cloneJson(value));
  }
  return copy;
}

function cloneInstance(instance: ResourceInstance): ResourceInstance {
  const copy: ResourceInstance = { extra: cloneJsonObject(instance.extra) };
  if (instance.indexKey !== undefined) {
    copy.indexKey = instance.indexKey;
  }
  if (instance.deposed !== undefined) {
    copy.deposed = instance.deposed;
  }
  if (instance.attributes !== undefined) {
    copy.attributes = cloneJsonObject(instance.attributes);
  }
  if (instance.sensitiveAttributes !== undefined) {
    copy.sensitiveAttributes = cloneJson(instance.sensitiveAttributes);
  }
  if (instance.private !== undefined) {
    copy.private = instance.private;
  }
  if (instance.dependencies !== undefined) {
    copy.dependencies = [...instance.dependencies];
  }
  return copy;
}

/**
 * Deep copy a resource entry.
 */
export function cloneResource(resource: ResourceEntry): ResourceEntry {
  return {
    ...resource,
    module: [...resource.module],
    instances: resource.instances.map(cloneInstance),
    extra: cloneJsonObject(resource.extra),
  };
}

/**
 * Deep copy a document so callers can mutate it freely.
 */
export function cloneState(document: StateDocument): StateDocument {
  const copy: StateDocument = {
    version: document.version,
    terraformVersion: document.terraformVersion,
    serial: document.serial,
    lineage: document.lineage,
    resources: document.resources.map(cloneResource),
    extra: cloneJsonObject(document.extra),
  };
  if (document.outputs !== undefined) {
    copy.outputs = cloneJsonObject(document.outputs);
  }
  return copy;
}
