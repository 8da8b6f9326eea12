import type { ParserDependencies, ResponseParser } from "./ResponseParser.js";
import { GenericParser } from "./GenericParser.js";
import { TagDialectParser } from "./TagDialectParser.js";

export interface ModelIdentity {
  provider: string;
  model: string;
}

export type ParserFactory = (deps: Partial<ParserDependencies>) => ResponseParser;

export interface ParserRegistration {
  name: string;
  matches(identity: ModelIdentity): boolean;
  create: ParserFactory;
}

/** Ordered match table: the first registration whose predicate holds wins. */
export class ParserRegistry {
  private entries: ParserRegistration[] = [];
  private fallback?: ParserRegistration;

  register(entry: ParserRegistration, options: { fallback?: boolean } = {}): void {
    if (this.entries.some((existing) => existing.name === entry.name) || this.fallback?.name === entry.name) {
      throw new Error(`Parser already registered: ${entry.name}`);
    }
    if (options.fallback) {
      this.fallback = entry;
      return;
    }
    this.entries.push(entry);
  }

  resolve(identity: ModelIdentity): ParserRegistration {
    const entry = this.entries.find((candidate) => candidate.matches(identity)) ?? this.fallback;
    if (!entry) {
      throw new Error(`No parser registered for ${identity.provider}/${identity.model}`);
    }
    return entry;
  }

  create(identity: ModelIdentity, deps: Partial<ParserDependencies> = {}): ResponseParser {
    return this.resolve(identity).create(deps);
  }

  list(): string[] {
    const names = this.entries.map((entry) => entry.name);
    return this.fallback ? [...names, this.fallback.name] : names;
  }
}

const mentions = (identity: ModelIdentity, pattern: RegExp): boolean =>
  pattern.test(identity.provider) || pattern.test(identity.model);

export const createDefaultParserRegistry = (): ParserRegistry => {
  const registry = new ParserRegistry();
  registry.register({
    name: "tag",
    matches: (identity) => mentions(identity, /qwen|qwq/i),
    create: (deps) => new TagDialectParser(deps),
  });
  registry.register(
    {
      name: "generic",
      matches: () => true,
      create: (deps) => new GenericParser(deps),
    },
    { fallback: true },
  );
  return registry;
};

export const defaultParserRegistry = createDefaultParserRegistry();
