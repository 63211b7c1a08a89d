/**
 * Declaration Parser
 * Maps a declaration (`name: value`) to the properties it sets. Every
 * property name has a handler in a static table; custom properties
 * (`--name`) are captured as raw text instead.
 *
 * A value containing `var()` cannot be parsed until the cascade knows the
 * variables in scope, so it is kept as a `deferred` value holding the raw
 * text. A shorthand defers as a whole.
 */

import { CssParseError, isVarSignal, TokenStream } from '../syntax/index.js';
import { parseColor, type ColorValue, type Length, type Unit } from '../values/index.js';
import { isKeywordExhausted, readLength, readNonNegativeLength, readNonNegativeUnit, readStrokeWidth, readUnit } from './grammars/leaf.js';
import { parseBackgroundImage } from './grammars/gradient.js';
import { parseBoxShadow, parseTextShadow } from './grammars/shadow.js';
import { SHORTHAND_GRAMMARS, type ShorthandGrammar } from './grammars/shorthands.js';
import {
  parseDisplay,
  parseFontFamily,
  parseFontSize,
  parseFontStyle,
  parseFontWeight,
  parseFontWidth,
  parseOpacity,
  parsePosition,
  parseTextAlign,
  parseZIndex,
} from './grammars/simple.js';
import { parseTransform } from './grammars/transform.js';
import {
  COLOR_PROPERTIES,
  exact,
  INHERIT,
  INITIAL,
  LENGTH_PROPERTIES,
  LIMIT_PROPERTIES,
  NUMBER_PROPERTIES,
  UNIT_PROPERTIES,
  type ColorPropertyName,
  type DeferredValue,
  type LengthPropertyName,
  type LimitPropertyName,
  type NumberPropertyName,
  type Property,
  type PropertyName,
  type PropertyValue,
  type ShorthandName,
  type UnitPropertyName,
} from './property.js';

export type DeclarationHandler = (stream: TokenStream) => Property[];

export type Declaration =
  | { kind: 'properties'; properties: Property[] }
  | { kind: 'variable'; name: string; raw: string };

type Grammar<T> = (stream: TokenStream) => PropertyValue<T>;

// ---------- Deferral ----------

/** Consume the rest of the value and keep it as raw text. */
function deferRest(stream: TokenStream): DeferredValue {
  stream.skipWhitespace();
  const location = stream.currentLocation();
  const start = stream.position();
  while (!stream.isExhausted()) stream.next();
  return { kind: 'deferred', raw: stream.sliceFrom(start).trimEnd(), location };
}

/**
 * Run `parse` over the whole value. If it meets a `var()` call, rewind and
 * hand the raw value to `onDefer` instead. Other errors propagate.
 */
function exactOrDeferred<R>(stream: TokenStream, parse: (stream: TokenStream) => R, onDefer: (value: DeferredValue) => R): R {
  const start = stream.state();
  try {
    const result = parse(stream);
    stream.expectExhausted();
    return result;
  } catch (error) {
    if (!isVarSignal(error)) throw error;
    stream.reset(start);
    return onDefer(deferRest(stream));
  }
}

export function parseProperty<T>(stream: TokenStream, grammar: Grammar<T>): PropertyValue<T> {
  if (isKeywordExhausted(stream, 'initial')) return INITIAL;
  if (isKeywordExhausted(stream, 'inherit')) return INHERIT;
  return exactOrDeferred<PropertyValue<T>>(stream, grammar, (deferred) => deferred);
}

export function parseShorthand(stream: TokenStream, name: ShorthandName, grammar: ShorthandGrammar): Property[] {
  if (isKeywordExhausted(stream, 'initial')) return grammar.expand(INITIAL);
  if (isKeywordExhausted(stream, 'inherit')) return grammar.expand(INHERIT);
  return exactOrDeferred(stream, grammar.parse, (value): Property[] => [{ name, value }]);
}

// ---------- Handler table ----------

const plain =
  <T>(read: (stream: TokenStream) => T): Grammar<T> =>
  (stream) =>
    exact(read(stream));

const color = (name: ColorPropertyName): DeclarationHandler => {
  const grammar = plain<ColorValue>(parseColor);
  return (stream) => [{ name, value: parseProperty(stream, grammar) }];
};

const length = (name: LengthPropertyName, read: (stream: TokenStream) => Length): DeclarationHandler => {
  const grammar = plain(read);
  return (stream) => [{ name, value: parseProperty(stream, grammar) }];
};

const limit = (name: LimitPropertyName): DeclarationHandler => {
  const grammar = plain(readNonNegativeLength);
  return (stream) => [{ name, value: parseProperty(stream, grammar) }];
};

const unit = (name: UnitPropertyName, read: (stream: TokenStream) => Unit): DeclarationHandler => {
  const grammar = plain(read);
  return (stream) => [{ name, value: parseProperty(stream, grammar) }];
};

const number = (name: NumberPropertyName, grammar: Grammar<number>): DeclarationHandler => {
  return (stream) => [{ name, value: parseProperty(stream, grammar) }];
};

const LENGTH_READERS: Record<LengthPropertyName, (stream: TokenStream) => Length> = {
  'border-top-left-radius': readNonNegativeLength,
  'border-top-right-radius': readNonNegativeLength,
  'border-bottom-right-radius': readNonNegativeLength,
  'border-bottom-left-radius': readNonNegativeLength,
  'border-top-width': readStrokeWidth,
  'border-right-width': readStrokeWidth,
  'border-bottom-width': readStrokeWidth,
  'border-left-width': readStrokeWidth,
  'flex-basis': readNonNegativeLength,
  'outline-offset': readLength,
  'outline-width': readStrokeWidth,
};

const UNIT_READERS: Record<UnitPropertyName, (stream: TokenStream) => Unit> = {
  top: readUnit,
  right: readUnit,
  bottom: readUnit,
  left: readUnit,
  'child-top': readNonNegativeUnit,
  'child-right': readNonNegativeUnit,
  'child-bottom': readNonNegativeUnit,
  'child-left': readNonNegativeUnit,
  'child-between': readNonNegativeUnit,
  width: readNonNegativeUnit,
  height: readNonNegativeUnit,
  'line-height': readNonNegativeUnit,
  'letter-spacing': readUnit,
  'word-spacing': readUnit,
};

const NUMBER_GRAMMARS: Record<NumberPropertyName, Grammar<number>> = {
  'font-size': parseFontSize,
  'font-weight': parseFontWeight,
  'font-width': parseFontWidth,
  opacity: parseOpacity,
  'z-index': parseZIndex,
};

function buildHandlers(): Map<string, DeclarationHandler> {
  const handlers = new Map<string, DeclarationHandler>();

  for (const name of COLOR_PROPERTIES) handlers.set(name, color(name));
  for (const name of LENGTH_PROPERTIES) handlers.set(name, length(name, LENGTH_READERS[name]));
  for (const name of LIMIT_PROPERTIES) handlers.set(name, limit(name));
  for (const name of UNIT_PROPERTIES) handlers.set(name, unit(name, UNIT_READERS[name]));
  for (const name of NUMBER_PROPERTIES) handlers.set(name, number(name, NUMBER_GRAMMARS[name]));

  handlers.set('background-image', (s) => [{ name: 'background-image', value: parseProperty(s, parseBackgroundImage) }]);
  handlers.set('box-shadow', (s) => [{ name: 'box-shadow', value: parseProperty(s, parseBoxShadow) }]);
  handlers.set('text-shadow', (s) => [{ name: 'text-shadow', value: parseProperty(s, parseTextShadow) }]);
  handlers.set('display', (s) => [{ name: 'display', value: parseProperty(s, parseDisplay) }]);
  handlers.set('font-family', (s) => [{ name: 'font-family', value: parseProperty(s, parseFontFamily) }]);
  handlers.set('font-style', (s) => [{ name: 'font-style', value: parseProperty(s, parseFontStyle) }]);
  handlers.set('position', (s) => [{ name: 'position', value: parseProperty(s, parsePosition) }]);
  handlers.set('text-align', (s) => [{ name: 'text-align', value: parseProperty(s, parseTextAlign) }]);
  handlers.set('transform', (s) => [{ name: 'transform', value: parseProperty(s, parseTransform) }]);

  for (const [name, grammar] of SHORTHAND_GRAMMARS) {
    handlers.set(name, (s) => parseShorthand(s, name, grammar));
  }

  return handlers;
}

/** Property name → handler. Keys are lower-case. */
export const HANDLERS: ReadonlyMap<string, DeclarationHandler> = buildHandlers();

// ---------- Entry points ----------

/**
 * Parse one declaration value. `stream` must cover exactly the value.
 * Throws `CssParseError` when the value does not fit the property's grammar.
 */
export function parseDeclaration(name: string, stream: TokenStream): Declaration {
  if (name.startsWith('--')) {
    stream.skipWhitespace();
    const start = stream.position();
    while (!stream.isExhausted()) stream.next();
    return { kind: 'variable', name, raw: stream.sliceFrom(start).trim() };
  }

  const handler = HANDLERS.get(name.toLowerCase());
  if (!handler) {
    throw new CssParseError('syntax', `Unknown property \`${name}\``, stream.currentLocation());
  }
  return { kind: 'properties', properties: handler(stream) };
}

/**
 * Parse `text` as the value of `name`. Used after `var()` substitution, so
 * `initial`, `inherit` and shorthand expansion behave as in the stylesheet.
 */
export function reparseProperty(name: PropertyName, text: string): Property[] {
  const stream = TokenStream.fromSource(text);
  const handler = HANDLERS.get(name);
  if (!handler) {
    throw new CssParseError('syntax', `Unknown property \`${name}\``, stream.currentLocation());
  }
  return handler(stream);
}
