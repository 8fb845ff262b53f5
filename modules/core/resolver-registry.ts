/**
 * Resolver Registry
 * Names the ways of answering "nearest smooth size" and dispatches queries to them
 */

import { DEFAULT_ALLOWED_FACTORS, DEFAULT_TABLE_EXPONENTS } from "@shared/smooth-const";
import { InvalidArgumentError, OutOfRangeError, ResolverNotFoundError } from "@shared/smooth-errors";
import { Dimension, parseArgument } from "@shared/smooth-schema";
import { searchNearest, type SearchResult } from "../smooth/nearest-search";
import { resolveFactorSet, type AllowedFactorsInput, type FactorSet } from "../smooth/smoothness";
import {
  buildTable,
  deriveCeiling,
  type MaxExponentsInput,
  type SmoothTable,
} from "../table/table-builder";
import { lookup } from "../table/table-lookup";

export interface SmoothResolver {
  name: string;
  description: string;
  /** Resolver consulted when this one raises OutOfRangeError. */
  fallback?: string;
  initialize: () => boolean;
  nearest: (n: number, ascending: boolean) => SearchResult;
  cleanup?: () => void;
}

export type TableSource =
  | { kind: "exponents"; maxExponents: MaxExponentsInput; ceiling?: number }
  /** Without a ceiling the table is treated as a prefix, complete only up to its last entry. */
  | { kind: "table"; table: SmoothTable; ceiling?: number };

export type TableResolverOptions = {
  name?: string;
  source?: TableSource;
  fallback?: string;
};

export function createFactorizationResolver(
  allowedFactors: AllowedFactorsInput = DEFAULT_ALLOWED_FACTORS,
  name = "factorization",
): SmoothResolver {
  let set: FactorSet | null = null;
  return {
    name,
    description: "Trial-division walk to the nearest smooth value",
    initialize: () => {
      set = resolveFactorSet(allowedFactors);
      return true;
    },
    nearest: (n, ascending) => {
      if (!set) throw new InvalidArgumentError(name, "resolver used before initialize()");
      return searchNearest(n, ascending, set);
    },
    cleanup: () => {
      set = null;
    },
  };
}

export function createTableResolver(options: TableResolverOptions = {}): SmoothResolver {
  const name = options.name ?? "table";
  const source: TableSource = options.source ?? {
    kind: "exponents",
    maxExponents: DEFAULT_TABLE_EXPONENTS,
  };
  let table: SmoothTable | null = null;
  let covers: (n: number) => boolean = () => false;

  return {
    name,
    description: "Binary search over a precomputed smooth-number table",
    fallback: options.fallback,
    initialize: () => {
      const built =
        source.kind === "table" ? source.table : buildTable(source.maxExponents, source.ceiling);
      const ceiling =
        source.kind === "exponents" ? source.ceiling ?? deriveCeiling(source.maxExponents) : source.ceiling;
      const last = built.length ? built[built.length - 1] : 0;
      covers = ceiling === undefined ? (n) => n <= last : (n) => n < ceiling;
      table = built;
      return table.length > 0;
    },
    nearest: (n, ascending) => {
      if (!table) throw new InvalidArgumentError(name, "resolver used before initialize()");
      if (!covers(n)) {
        throw new OutOfRangeError(
          n,
          ascending ? "larger" : "smaller",
          `${n} is outside the range covered by the ${name} resolver`,
        );
      }
      return { value: lookup(table, n, ascending) };
    },
    cleanup: () => {
      table = null;
      covers = () => false;
    },
  };
}

export class ResolverRegistry {
  private resolvers = new Map<string, SmoothResolver>();
  private initialized = new Set<string>();

  register(resolver: SmoothResolver): void {
    this.resolvers.set(resolver.name, resolver);
    this.initialized.delete(resolver.name);
  }

  getAvailable(): string[] {
    return Array.from(this.resolvers.keys());
  }

  private require(name: string): SmoothResolver {
    const resolver = this.resolvers.get(name);
    if (!resolver) {
      throw new ResolverNotFoundError(name);
    }
    return resolver;
  }

  initialize(name: string): boolean {
    const resolver = this.require(name);
    if (this.initialized.has(name)) return true;

    const success = resolver.initialize();
    if (success) {
      this.initialized.add(name);
    }
    return success;
  }

  /**
   * Answer a query with the named resolver, initializing it on first use and
   * following its fallback chain past OutOfRangeError.
   */
  resolve(name: string, n: number, ascending = true): SearchResult {
    const value = parseArgument(Dimension, n, "n");
    const visited = new Set<string>();
    let current: string | undefined = name;
    let lastError: OutOfRangeError | null = null;

    while (current !== undefined && !visited.has(current)) {
      visited.add(current);
      const resolver = this.require(current);
      if (!this.initialize(current)) {
        throw new InvalidArgumentError(current, "resolver failed to initialize");
      }
      try {
        return resolver.nearest(value, ascending);
      } catch (error) {
        if (!(error instanceof OutOfRangeError)) throw error;
        lastError = error;
        current = resolver.fallback;
      }
    }

    if (lastError) throw lastError;
    throw new ResolverNotFoundError(name);
  }

  cleanup(): void {
    for (const name of this.initialized) {
      this.resolvers.get(name)?.cleanup?.();
    }
    this.initialized.clear();
  }
}

export const smoothResolvers = new ResolverRegistry();

smoothResolvers.register(createFactorizationResolver());
smoothResolvers.register(createTableResolver({ fallback: "factorization" }));
