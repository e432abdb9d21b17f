import { DeployError } from '../errors.js';

export type TokenLiteral = string | number | boolean;
export type TokenLookup = (name: string) => string;
export type DeferredToken = (lookup: TokenLookup) => TokenLiteral;
export type TokenValue = TokenLiteral | DeferredToken;
export type TokenMap = Record<string, TokenValue>;
export type ResolvedTokens = Record<string, string>;

export interface ResolveTokensOptions {
  maxDepth?: number;
}

export const DEFAULT_MAX_TOKEN_DEPTH = 32;

const TOKEN_REFERENCE = /\{\{\s*([A-Za-z_][A-Za-z0-9_.-]*)\s*\}\}/g;

function isTokenLiteral(value: unknown): value is TokenLiteral {
  return typeof value === 'string' || typeof value === 'boolean' || (typeof value === 'number' && Number.isFinite(value));
}

function formatChain(path: readonly string[], next: string): string {
  return [...path, next].join(' -> ');
}

export function findTokenReferences(text: string): string[] {
  const seen = new Set<string>();
  for (const match of text.matchAll(TOKEN_REFERENCE)) {
    const name = match[1];
    if (name) {
      seen.add(name);
    }
  }
  return [...seen];
}

function replaceReferences(text: string, resolve: (name: string) => string): string {
  return text.replace(TOKEN_REFERENCE, (_match, name: string) => resolve(name));
}

/**
 * Resolves every token to a string.
 *
 * Literals are stringified and have their `{{Name}}` references expanded. Deferred
 * tokens are called once with a lookup scoped to the current resolution path, so a
 * deferred value that asks for a token still being resolved is reported as a cycle.
 */
export function resolveTokens(tokens: TokenMap, options: ResolveTokensOptions = {}): ResolvedTokens {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_TOKEN_DEPTH;
  const resolved = new Map<string, string>();
  const active = new Set<string>();

  const resolveOne = (name: string, path: readonly string[]): string => {
    const cached = resolved.get(name);
    if (cached !== undefined) {
      return cached;
    }

    if (active.has(name)) {
      throw new DeployError('TOKEN_CYCLE', `Circular token reference: ${formatChain(path, name)}`, {
        details: { chain: [...path, name] }
      });
    }

    if (path.length >= maxDepth) {
      throw new DeployError(
        'TOKEN_DEPTH',
        `Token "${name}" is nested deeper than ${maxDepth} levels: ${formatChain(path, name)}`,
        { details: { chain: [...path, name], maxDepth } }
      );
    }

    const raw = Object.prototype.hasOwnProperty.call(tokens, name) ? tokens[name] : undefined;
    if (raw === undefined) {
      const referrer = path[path.length - 1];
      const message = referrer
        ? `Token "${referrer}" references undefined token "${name}"`
        : `Token "${name}" is not defined`;
      throw new DeployError('TOKEN_UNRESOLVED', message, { details: { token: name, referrer } });
    }

    const childPath = [...path, name];
    const lookup: TokenLookup = (other) => resolveOne(other, childPath);

    active.add(name);
    try {
      let literal: TokenLiteral;
      if (typeof raw === 'function') {
        let produced: unknown;
        try {
          produced = raw(lookup);
        } catch (error) {
          if (error instanceof DeployError) {
            throw error;
          }
          throw new DeployError('TOKEN_EVALUATION', `Deferred token "${name}" failed to evaluate`, {
            cause: error,
            details: { token: name }
          });
        }
        if (!isTokenLiteral(produced)) {
          throw new DeployError(
            'TOKEN_EVALUATION',
            `Deferred token "${name}" returned ${produced === null ? 'null' : typeof produced}, expected a string, number or boolean`,
            { details: { token: name } }
          );
        }
        literal = produced;
      } else {
        literal = raw;
      }

      const value = replaceReferences(String(literal), lookup);
      resolved.set(name, value);
      return value;
    } finally {
      active.delete(name);
    }
  };

  const result: ResolvedTokens = {};
  for (const name of Object.keys(tokens).sort()) {
    result[name] = resolveOne(name, []);
  }
  return result;
}

export function expandTokens(text: string, resolved: ResolvedTokens): string {
  return replaceReferences(text, (name) => {
    const value = Object.prototype.hasOwnProperty.call(resolved, name) ? resolved[name] : undefined;
    if (value === undefined) {
      throw new DeployError('TOKEN_UNRESOLVED', `Reference to undefined token "${name}" in "${text}"`, {
        details: { token: name }
      });
    }
    return value;
  });
}

export type TokenExpandable = string | number | boolean | null | undefined | TokenExpandable[] | { [key: string]: TokenExpandable };

export function expandTokensDeep<T extends TokenExpandable>(value: T, resolved: ResolvedTokens): T;
export function expandTokensDeep(value: TokenExpandable, resolved: ResolvedTokens): TokenExpandable {
  if (typeof value === 'string') {
    return expandTokens(value, resolved);
  }
  if (Array.isArray(value)) {
    return value.map((item) => expandTokensDeep(item, resolved));
  }
  if (value && typeof value === 'object') {
    const result: { [key: string]: TokenExpandable } = {};
    for (const [key, nested] of Object.entries(value)) {
      result[key] = expandTokensDeep(nested, resolved);
    }
    return result;
  }
  return value;
}
