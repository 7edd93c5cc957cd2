/**
 * Address Parsing and Formatting
 *
 * Module paths, resource addresses and provider configuration addresses all
 * share the same leading `module.<name>[key].` segments. These helpers split
 * that prefix off so the rest of the engine can work on segment lists.
 */

import type { IndexKey, ModulePath, ResourceMode } from '../state/types.js';
import { AddressError } from './errors.js';

const MODULE_KEYWORD = 'module.';
const IDENTIFIER = /[A-Za-z_][A-Za-z0-9_-]*/y;
const RESOURCE_PART = /^([A-Za-z_][A-Za-z0-9_-]*)\.([A-Za-z_][A-Za-z0-9_-]*)(\[(.+)\])?$/;

/**
 * Parsed resource address
 */
export interface ResourceAddress {
  module: ModulePath;
  mode: ResourceMode;
  type: string;
  name: string;
  indexKey?: IndexKey;
}

/**
 * Address split into its leading module segments and whatever follows them
 */
export interface ModulePrefixSplit {
  module: ModulePath;
  remainder: string;
}

/**
 * Read one `module.<name>` segment, with optional instance key, at `start`.
 *
 * @returns The segment text and the offset just past it, or null when
 *          `text` does not continue with a module segment at `start`
 */
function readModuleSegment(
  text: string,
  start: number
): { segment: string; end: number } | null {
  if (!text.startsWith(MODULE_KEYWORD, start)) {
    return null;
  }

  IDENTIFIER.lastIndex = start + MODULE_KEYWORD.length;
  const nameMatch = IDENTIFIER.exec(text);
  if (!nameMatch) {
    throw new AddressError(`Missing module name at offset ${start} in "${text}"`, text);
  }

  let end = IDENTIFIER.lastIndex;
  if (text[end] === '[') {
    end = readKeyEnd(text, end);
  }

  return { segment: text.slice(start, end), end };
}

/**
 * Find the offset just past the `]` closing an instance key opened at `open`.
 */
function readKeyEnd(text: string, open: number): number {
  let i = open + 1;

  if (text[i] === '"') {
    i++;
    while (i < text.length && text[i] !== '"') {
      i += text[i] === '\\' ? 2 : 1;
    }
    i++;
  } else {
    while (i < text.length && text[i] !== ']') {
      i++;
    }
  }

  if (text[i] !== ']') {
    throw new AddressError(`Unterminated instance key in "${text}"`, text);
  }

  // Validate the key itself
  parseIndexKey(text.slice(open + 1, i), text);
  return i + 1;
}

/**
 * Parse the inside of an instance key: a decimal integer or a JSON string.
 */
export function parseIndexKey(raw: string, address: string = raw): IndexKey {
  if (/^\d+$/.test(raw)) {
    return Number(raw);
  }

  if (raw.startsWith('"')) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      throw new AddressError(`Invalid instance key ${raw} in "${address}"`, address);
    }
    if (typeof parsed === 'string') {
      return parsed;
    }
  }

  throw new AddressError(`Invalid instance key ${raw} in "${address}"`, address);
}

/**
 * Format an instance key the way addresses print it: `[0]` or `["key"]`.
 */
export function formatIndexKey(key: IndexKey | undefined): string {
  if (key === undefined) {
    return '';
  }
  return typeof key === 'number' ? `[${key}]` : `[${JSON.stringify(key)}]`;
}

/**
 * Split leading module segments off an address.
 *
 * `module.a.module.b["x"].aws_vpc.main` → module `[module.a, module.b["x"]]`,
 * remainder `aws_vpc.main`.
 */
export function splitModulePrefix(address: string): ModulePrefixSplit {
  const module: string[] = [];
  let position = 0;

  for (;;) {
    const read = readModuleSegment(address, position);
    if (!read) {
      break;
    }
    module.push(read.segment);
    position = read.end;

    if (position === address.length) {
      break;
    }
    if (address[position] !== '.') {
      throw new AddressError(
        `Unexpected "${address[position]}" after ${read.segment} in "${address}"`,
        address
      );
    }
    position++;
  }

  return { module, remainder: address.slice(position) };
}

/**
 * Parse a module address such as `module.a.module.b` into its segments.
 *
 * The empty string is the root module.
 *
 * @throws AddressError if the text is not a module address
 */
export function parseModulePath(address: string): ModulePath {
  const trimmed = address.trim();
  if (trimmed === '') {
    return [];
  }

  const { module, remainder } = splitModulePrefix(trimmed);
  if (module.length === 0 || remainder !== '' || trimmed.endsWith('.')) {
    throw new AddressError(`"${address}" is not a module address`, address);
  }
  return module;
}

/**
 * Format a module path back into its address form.
 */
export function formatModulePath(path: ModulePath): string {
  return path.join('.');
}

/**
 * Human-readable module path, naming the root module explicitly.
 */
export function describeModulePath(path: ModulePath): string {
  return path.length === 0 ? '(root module)' : formatModulePath(path);
}

/**
 * Parse a resource or resource-instance address.
 *
 * Accepts the forms found in `dependencies`:
 * `aws_vpc.main`, `data.aws_ami.ubuntu`, `module.net.aws_subnet.a[0]`.
 *
 * @throws AddressError if the text is not a resource address
 */
export function parseResourceAddress(address: string): ResourceAddress {
  const { module, remainder } = splitModulePrefix(address);

  let mode: ResourceMode = 'managed';
  let rest = remainder;
  if (rest.startsWith('data.')) {
    mode = 'data';
    rest = rest.slice('data.'.length);
  }

  const match = RESOURCE_PART.exec(rest);
  if (!match || match[1] === undefined || match[2] === undefined) {
    throw new AddressError(`"${address}" is not a resource address`, address);
  }

  const parsed: ResourceAddress = { module, mode, type: match[1], name: match[2] };
  if (match[4] !== undefined) {
    parsed.indexKey = parseIndexKey(match[4], address);
  }
  return parsed;
}

/**
 * Format a resource address. The instance key is included when present.
 */
export function formatResourceAddress(address: ResourceAddress): string {
  const local = `${address.mode === 'data' ? 'data.' : ''}${address.type}.${address.name}${formatIndexKey(address.indexKey)}`;
  return address.module.length > 0 ? `${formatModulePath(address.module)}.${local}` : local;
}
