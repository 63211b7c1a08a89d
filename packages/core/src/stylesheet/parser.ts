/**
 * Rule Parser
 * Turns stylesheet text into rules. A bad selector drops its whole rule, a
 * bad declaration drops only itself; both are reported to the sink and
 * parsing carries on.
 */

import { consoleSink, type DiagnosticCode, type DiagnosticSink } from '../diagnostics/index.js';
import { parseDeclaration, type Property } from '../properties/index.js';
import { CssParseError, TokenStream, type Token } from '../syntax/index.js';
import {
  CHILD,
  DESCENDANT,
  hasPseudos,
  isPseudoClass,
  specificityOf,
  WILDCARD,
  type Combinator,
  type Selector,
} from './selector.js';

export interface Rule {
  readonly specificity: number;
  readonly selectors: readonly Selector[];
  /** Shared by every rule parsed from the same block */
  readonly properties: readonly Property[];
  readonly hasPseudos: boolean;
  readonly variables: ReadonlyArray<readonly [name: string, raw: string]>;
}

export interface ParseOptions {
  /** Reported with every diagnostic */
  fileName?: string;
  sink?: DiagnosticSink;
}

interface ParseContext {
  fileName: string | undefined;
  sink: DiagnosticSink;
}

interface Block {
  properties: Property[];
  variables: Array<[string, string]>;
}

const isOpenBrace = (token: Token) => token.type === '{';
const isSemicolon = (token: Token) => token.type === 'semicolon';

function consumeAll(stream: TokenStream): void {
  while (!stream.isExhausted()) stream.next();
}

function firstLine(text: string): string {
  return text.trim().split(/\r\n|[\r\n\f]/)[0];
}

// ============================================================================
// Selectors
// ============================================================================

/** One comma-separated entry of a prelude. */
function parseSelectorChain(stream: TokenStream): Selector[] {
  const chain: Selector[] = [];
  let pending: Combinator | null = null;
  let foundAtom = false;

  while (!stream.isExhausted()) {
    const token = stream.nextIncludingWhitespace();
    let atom: Selector | null = null;
    switch (token.type) {
      case 'whitespace':
        if (foundAtom && !pending) pending = DESCENDANT;
        break;
      case 'ident':
        atom = { kind: 'class', name: token.value };
        break;
      case 'colon': {
        const pseudo = stream.nextIncludingWhitespace();
        const name = pseudo.type === 'ident' ? pseudo.value.toLowerCase() : '';
        if (!isPseudoClass(name)) throw stream.unexpected(pseudo);
        atom = { kind: name };
        break;
      }
      case 'delim':
        if (token.value === '*') atom = WILDCARD;
        else if (token.value === '>') pending = CHILD;
        else if (token.value !== '.') throw stream.unexpected(token);
        break;
      default:
        throw stream.unexpected(token);
    }

    if (atom) {
      if (pending) chain.push(pending);
      pending = null;
      foundAtom = true;
      chain.push(atom);
    }
  }

  if (!foundAtom) throw stream.error('syntax', 'Expected a selector');
  if (pending === CHILD) throw stream.error('syntax', 'Expected a selector after `>`');
  return chain;
}

// ============================================================================
// Declaration blocks
// ============================================================================

function reportDeclaration(error: CssParseError, text: string, context: ParseContext): void {
  const unsupported = error.kind === 'unsupported-value';
  const code: DiagnosticCode = unsupported ? 'unsupported-value' : 'malformed-declaration';
  const prefix = unsupported ? 'Unsupported CSS value' : 'Failed to parse CSS property';
  context.sink.log(`${prefix}: \`${firstLine(text)}\``, error.location, context.fileName, code);
}

function parseBlock(stream: TokenStream, context: ParseContext): Block {
  const block: Block = { properties: [], variables: [] };

  for (;;) {
    stream.skipWhitespace();
    const next = stream.peek();
    if (!next) return block;
    if (next.type === 'semicolon') {
      stream.next();
      continue;
    }

    const start = stream.position();
    const saved = stream.state();
    try {
      const declaration = stream.parseUntilBefore(isSemicolon, (decl) => {
        const name = decl.expectIdent();
        decl.expectColon();
        return parseDeclaration(name, decl);
      });
      if (declaration.kind === 'variable') {
        block.variables.push([declaration.name, declaration.raw]);
      } else {
        block.properties.push(...declaration.properties);
      }
    } catch (error) {
      if (!(error instanceof CssParseError)) throw error;
      stream.reset(saved);
      stream.parseUntilBefore(isSemicolon, consumeAll);
      reportDeclaration(error, stream.sliceFrom(start), context);
    }

    if (!stream.isExhausted()) stream.next();
  }
}

// ============================================================================
// Rules
// ============================================================================

function parseQualifiedRule(stream: TokenStream, context: ParseContext): Rule[] {
  const chains = stream.parseUntilBefore(isOpenBrace, (prelude) => prelude.parseCommaSeparated(parseSelectorChain));
  const open = stream.next();
  if (open.type !== '{') throw stream.unexpected(open);
  const block = stream.parseNestedBlock((body) => parseBlock(body, context));

  const properties = Object.freeze(block.properties);
  const variables = Object.freeze(block.variables.map(([name, raw]) => Object.freeze([name, raw] as const)));
  return chains.map((selectors) =>
    Object.freeze({
      specificity: specificityOf(selectors),
      selectors: Object.freeze(selectors),
      properties,
      hasPseudos: hasPseudos(selectors),
      variables,
    }),
  );
}

/** Skip an at-rule or the remains of a rejected rule: through the next block, or up to a semicolon. */
function skipRule(stream: TokenStream, atRule: boolean): void {
  stream.parseUntilBefore((token) => isOpenBrace(token) || (atRule && isSemicolon(token)), consumeAll);
  if (!stream.isExhausted()) stream.next();
}

/**
 * Parse every rule in `text`, in source order. Problems are logged to the
 * sink (`console.warn` by default) and never thrown.
 */
export function parseRules(text: string, options: ParseOptions = {}): Rule[] {
  const context: ParseContext = { fileName: options.fileName, sink: options.sink ?? consoleSink };
  const stream = TokenStream.fromSource(text);
  const rules: Rule[] = [];

  for (;;) {
    stream.skipWhitespace();
    const token = stream.peek();
    if (!token) return rules;
    if (token.type === 'cdo' || token.type === 'cdc') {
      stream.next();
      continue;
    }

    const start = stream.position();
    const location = stream.currentLocation();
    if (token.type === 'at-keyword') {
      skipRule(stream, true);
      const message = `Failed to parse CSS rule: \`${firstLine(stream.sliceFrom(start))}\``;
      context.sink.log(message, location, context.fileName, 'malformed-rule');
      continue;
    }

    const saved = stream.state();
    try {
      rules.push(...parseQualifiedRule(stream, context));
    } catch (error) {
      if (!(error instanceof CssParseError)) throw error;
      stream.reset(saved);
      skipRule(stream, false);
      const message = `Failed to parse CSS rule: \`${firstLine(stream.sliceFrom(start))}\``;
      context.sink.log(message, error.location, context.fileName, 'malformed-rule');
    }
  }
}
