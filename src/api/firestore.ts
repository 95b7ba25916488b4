/**
 * Firestore REST value codec
 * Converts between Firestore's typed JSON values and plain JS values.
 */

import { ApiError } from '../errors.js';

export type FirestoreValue =
  | { nullValue: null }
  | { booleanValue: boolean }
  | { integerValue: string }
  | { doubleValue: number }
  | { stringValue: string }
  | { timestampValue: string }
  | { arrayValue: { values?: FirestoreValue[] } }
  | { mapValue: { fields?: FirestoreFields } };

export type FirestoreFields = Record<string, FirestoreValue>;

export interface FirestoreDocument {
  name: string;
  fields?: FirestoreFields;
  createTime?: string;
  updateTime?: string;
}

export type BatchGetResult =
  | { found: FirestoreDocument; readTime?: string }
  | { missing: string; readTime?: string };

export type PlainValue =
  | null
  | boolean
  | number
  | string
  | PlainValue[]
  | { [key: string]: PlainValue };

export function decodeValue(value: FirestoreValue): PlainValue {
  if ('nullValue' in value) return null;
  if ('booleanValue' in value) return value.booleanValue;
  if ('integerValue' in value) {
    // int64 beyond 2^53 stays a string
    const n = Number(value.integerValue);
    return Number.isSafeInteger(n) ? n : value.integerValue;
  }
  if ('doubleValue' in value) return Number(value.doubleValue);
  if ('stringValue' in value) return value.stringValue;
  if ('timestampValue' in value) return value.timestampValue;
  if ('arrayValue' in value) return (value.arrayValue.values ?? []).map(decodeValue);
  if ('mapValue' in value) return decodeFields(value.mapValue.fields);
  throw new ApiError(`Unsupported Firestore value: ${Object.keys(value).join(', ')}`);
}

export function decodeFields(fields: FirestoreFields | undefined): { [key: string]: PlainValue } {
  const result: { [key: string]: PlainValue } = {};
  for (const [key, value] of Object.entries(fields ?? {})) {
    result[key] = decodeValue(value);
  }
  return result;
}

export type EncodableValue =
  | null
  | undefined
  | boolean
  | number
  | string
  | Date
  | EncodableValue[]
  | { [key: string]: EncodableValue };

export function encodeValue(value: EncodableValue): FirestoreValue {
  if (value === null || value === undefined) return { nullValue: null };
  if (typeof value === 'boolean') return { booleanValue: value };
  if (typeof value === 'number') {
    return Number.isInteger(value) ? { integerValue: String(value) } : { doubleValue: value };
  }
  if (typeof value === 'string') return { stringValue: value };
  if (value instanceof Date) return { timestampValue: value.toISOString() };
  if (Array.isArray(value)) return { arrayValue: { values: value.map(encodeValue) } };
  return { mapValue: { fields: encodeFields(value) } };
}

/**
 * Encode an object's fields. Undefined properties are skipped rather than written as null.
 */
export function encodeFields(object: { [key: string]: EncodableValue }): FirestoreFields {
  const fields: FirestoreFields = {};
  for (const [key, value] of Object.entries(object)) {
    if (value !== undefined) {
      fields[key] = encodeValue(value);
    }
  }
  return fields;
}

/** Last path segment of a document name */
export function documentId(name: string): string {
  const slash = name.lastIndexOf('/');
  return slash === -1 ? name : name.slice(slash + 1);
}

/**
 * Quote a field path segment so ids with dashes or leading digits are accepted in update masks
 */
export function quoteFieldPath(segment: string): string {
  return `\`${segment.replace(/\\/g, '\\\\').replace(/`/g, '\\`')}\``;
}
