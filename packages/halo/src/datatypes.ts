import { fail } from "@cellkern/core";

export type BaseDatatype = {
  readonly kind: "base";
  readonly name: string;
  readonly size: number;
};

export type ContiguousDatatype = {
  readonly kind: "contiguous";
  readonly base: BaseDatatype;
  readonly count: number;
  readonly committed: boolean;
};

export type Datatype = BaseDatatype | ContiguousDatatype;

const BASE_TYPE_TABLE = [
  ["float64", "MPI_DOUBLE", 8],
  ["float32", "MPI_FLOAT", 4],
  ["int64", "MPI_INT64_T", 8],
  ["int32", "MPI_INT", 4],
  ["uint32", "MPI_UNSIGNED", 4],
  ["uint8", "MPI_UNSIGNED_CHAR", 1],
  ["complex128", "MPI_C_DOUBLE_COMPLEX", 16],
] as const;

const BASE_TYPES = new Map<string, BaseDatatype>();
for (const [dtype, name, size] of BASE_TYPE_TABLE) {
  BASE_TYPES.set(dtype, Object.freeze({ kind: "base", name, size }));
}

export function datatypeSize(type: Datatype): number {
  return type.kind === "base" ? type.size : type.base.size * type.count;
}

/**
 * Exchange datatypes keyed by (dtype, block size). Entries are created on
 * first request and kept for the lifetime of the registry; the key space is
 * small and fixed for a run, so nothing is ever evicted.
 */
export class DatatypeRegistry {
  readonly #types = new Map<string, Datatype>();

  get size(): number {
    return this.#types.size;
  }

  get(dtype: string, cdim: number): Datatype {
    const key = `${dtype}:${cdim}`;
    const cached = this.#types.get(key);
    if (cached) return cached;

    const base = BASE_TYPES.get(dtype);
    if (!base) {
      fail("CK3004", `Unknown base type '${dtype}'.`);
    }
    if (!Number.isInteger(cdim) || cdim < 1) {
      fail("CK3004", `Block size must be a positive integer (got ${cdim}).`);
    }
    const type: Datatype =
      cdim === 1 ? base : Object.freeze({ kind: "contiguous", base, count: cdim, committed: true });
    this.#types.set(key, type);
    return type;
  }
}

/** Shared by every halo that is not handed a registry of its own. */
export const defaultDatatypeRegistry = new DatatypeRegistry();
