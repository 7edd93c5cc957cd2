/**
 * State Document Types for tfsplit
 *
 * In-memory model of a Terraform state document (format version 4).
 * Only the fields the split engine reads or writes are modeled; everything
 * else rides along in `extra` so it can be written back unchanged.
 */

import type { LosslessNumber } from 'lossless-json';

// =============================================================================
// Opaque JSON values
// =============================================================================

/**
 * Numbers whose text would not survive a JS number (beyond 2^53, `1.10`)
 * are held as LosslessNumber with their original spelling.
 */
export type JsonPrimitive = string | number | boolean | null | LosslessNumber;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

// =============================================================================
// Addresses
// =============================================================================

/**
 * Module path, one segment per nesting level.
 *
 * Each segment is a module call such as `module.vpc` or `module.zone["eu"]`.
 * The empty path is the root module.
 */
export type ModulePath = readonly string[];

/**
 * Instance key of a resource using count (number) or for_each (string)
 */
export type IndexKey = number | string;

export type ResourceMode = 'managed' | 'data';

/**
 * Repetition mode of a resource: `none` for a single instance,
 * `list` for count, `map` for for_each
 */
export type EachMode = 'none' | 'list' | 'map';

// =============================================================================
// Document
// =============================================================================

/**
 * Root state document as returned by `state pull`
 */
export interface StateDocument {
  /** State format version (wire: version) */
  version: number;
  /** Version of the tool that last wrote the state (wire: terraform_version) */
  terraformVersion: string;
  /** Write counter, assigned +1 on every push */
  serial: number;
  /** Identifier of this state's history line */
  lineage: string;
  /** Root module outputs, never touched by the engine */
  outputs?: JsonObject;
  /** Resources in document order */
  resources: ResourceEntry[];
  /** Unrecognized top-level fields, in encounter order */
  extra: JsonObject;
}

/**
 * One resource block (all instances of a single configuration address)
 */
export interface ResourceEntry {
  /** Module containing the resource (wire: module, omitted for root) */
  module: ModulePath;
  mode: ResourceMode;
  type: string;
  name: string;
  /** Provider configuration address, e.g. provider["registry.terraform.io/hashicorp/aws"] */
  provider: string;
  /** Repetition mode (wire: each, omitted for none) */
  each: EachMode;
  instances: ResourceInstance[];
  /** Unrecognized resource-level fields */
  extra: JsonObject;
}

/**
 * One instance of a resource
 */
export interface ResourceInstance {
  /** Present when the resource uses count or for_each (wire: index_key) */
  indexKey?: IndexKey;
  /** Deposed object key, present for objects awaiting destroy after replacement */
  deposed?: string;
  attributes?: JsonObject;
  /** wire: sensitive_attributes */
  sensitiveAttributes?: JsonValue;
  /** Base64 provider-private blob */
  private?: string;
  /** Resource addresses this instance depends on */
  dependencies?: string[];
  /** Other instance fields (schema_version, status, create_before_destroy, ...) */
  extra: JsonObject;
}
