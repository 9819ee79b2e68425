/**
 * Document Codec
 *
 * Converts between framework JSON values and Bedrock documents. A Bedrock
 * document has the same shape as JSON but three numeric variants instead of
 * one: non-negative integers, negative integers and floats.
 *
 * Numbers that JSON cannot carry (NaN, ±Infinity) become null. Integers
 * beyond Number.MAX_SAFE_INTEGER are classified as floats, since they are
 * no longer exact. Object key order is not preserved across the wire.
 */

import type { ConverseCommandInput } from '@aws-sdk/client-bedrock-runtime';
import type { JsonValue } from '../framework';

export type BedrockNumber =
  | { kind: 'posInt'; value: number }
  | { kind: 'negInt'; value: number }
  | { kind: 'float'; value: number };

export type BedrockDocument =
  | { kind: 'null' }
  | { kind: 'bool'; value: boolean }
  | { kind: 'number'; value: BedrockNumber }
  | { kind: 'string'; value: string }
  | { kind: 'array'; value: BedrockDocument[] }
  | { kind: 'object'; value: Map<string, BedrockDocument> };

/** The plain document shape the SDK puts on the wire. */
export type WireDocument = Exclude<ConverseCommandInput['additionalModelRequestFields'], undefined>;

const NULL_DOCUMENT: BedrockDocument = { kind: 'null' };

export function classifyNumber(value: number): BedrockDocument {
  if (!Number.isFinite(value)) {
    return NULL_DOCUMENT;
  }
  if (Number.isSafeInteger(value)) {
    // -0 is an integer zero, which counts as non-negative
    return value >= 0
      ? { kind: 'number', value: { kind: 'posInt', value: value === 0 ? 0 : value } }
      : { kind: 'number', value: { kind: 'negInt', value } };
  }
  return { kind: 'number', value: { kind: 'float', value } };
}

export function jsonToDocument(value: JsonValue): BedrockDocument {
  if (value === null) {
    return NULL_DOCUMENT;
  }
  if (typeof value === 'boolean') {
    return { kind: 'bool', value };
  }
  if (typeof value === 'number') {
    return classifyNumber(value);
  }
  if (typeof value === 'string') {
    return { kind: 'string', value };
  }
  if (Array.isArray(value)) {
    return { kind: 'array', value: value.map(jsonToDocument) };
  }
  return {
    kind: 'object',
    value: new Map(Object.entries(value).map(([key, item]) => [key, jsonToDocument(item)])),
  };
}

export function documentToJson(document: BedrockDocument): JsonValue {
  switch (document.kind) {
    case 'null':
      return null;
    case 'bool':
    case 'string':
      return document.value;
    case 'number':
      return numberToJson(document.value);
    case 'array':
      return document.value.map(documentToJson);
    case 'object':
      return Object.fromEntries(
        [...document.value].map(([key, item]): [string, JsonValue] => [key, documentToJson(item)])
      );
  }
}

function numberToJson(number: BedrockNumber): JsonValue {
  switch (number.kind) {
    case 'posInt':
    case 'negInt':
      return number.value;
    case 'float':
      return Number.isFinite(number.value) ? number.value : null;
  }
}

export function documentToWire(document: BedrockDocument): WireDocument {
  return documentToJson(document);
}

export function documentFromWire(wire: WireDocument): BedrockDocument {
  return jsonToDocument(wire);
}

/** Framework JSON straight to the SDK's wire document. */
export function toWireDocument(value: JsonValue): WireDocument {
  return documentToWire(jsonToDocument(value));
}

/** SDK wire document straight to framework JSON; a missing document is null. */
export function fromWireDocument(wire: WireDocument | undefined): JsonValue {
  return wire === undefined ? null : documentToJson(documentFromWire(wire));
}
