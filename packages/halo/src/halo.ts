import { fail } from "@cellkern/core";

import { defaultDatatypeRegistry, type Datatype, type DatatypeRegistry } from "./datatypes.js";

export type InsertMode = "read" | "write" | "rw" | "inc" | "min" | "max";

export type NumericBuffer = {
  readonly length: number;
  [index: number]: number;
};

/** A distributed array: `cdim` values of type `dtype` per data slot. */
export type DataArray = {
  readonly dtype: string;
  readonly cdim: number;
  readonly data: NumericBuffer;
};

export type Communicator = {
  readonly size: number;
  readonly rank: number;
};

/**
 * Communication graph between locally owned data slots (roots) and their
 * ghost copies on other participants (leaves).
 */
export interface StarForest {
  readonly type: string;
  bcastBegin(unit: Datatype, rootData: NumericBuffer, leafData: NumericBuffer): void;
  bcastEnd(unit: Datatype, rootData: NumericBuffer, leafData: NumericBuffer): void;
  reduceBegin(unit: Datatype, leafData: NumericBuffer, rootData: NumericBuffer, op: "sum"): void;
  reduceEnd(unit: Datatype, leafData: NumericBuffer, rootData: NumericBuffer, op: "sum"): void;
}

/** The data layout a halo is built for: topology plus per-point dof counts. */
export interface HaloLayout {
  readonly comm: Communicator;
  /**
   * Star forest for ghost exchange. Exchanges read and write the same buffer,
   * so the graph must not contain roots that reference the local participant.
   */
  createStarForest(): StarForest;
  createGlobalNumbering(): Int32Array;
}

export type HaloOptions = {
  readonly datatypes?: DatatypeRegistry;
};

type Direction = "forward" | "reverse";

/**
 * Ghost-data exchange for one data layout.
 *
 * Global-to-local copies owned values into ghost slots and only supports
 * `"write"`; local-to-global sums ghost contributions back into their owners
 * and only supports `"inc"`. With a single participant every operation is a
 * no-op.
 */
export class Halo {
  readonly layout: HaloLayout;
  readonly #datatypes: DatatypeRegistry;
  #sf: StarForest | undefined;
  #numbering: Int32Array | undefined;

  constructor(layout: HaloLayout, opts: HaloOptions = {}) {
    this.layout = layout;
    this.#datatypes = opts.datatypes ?? defaultDatatypeRegistry;
  }

  get comm(): Communicator {
    return this.layout.comm;
  }

  /** Built on first use and cached for the lifetime of the halo. */
  get sf(): StarForest {
    if (this.#sf) return this.#sf;
    const sf = this.layout.createStarForest();
    if (sf.type !== "basic") {
      fail("CK3005", `Star forest type '${sf.type}' is not supported for halo exchange (use 'basic').`);
    }
    this.#sf = sf;
    return sf;
  }

  get localToGlobalNumbering(): Int32Array {
    if (!this.#numbering) this.#numbering = this.layout.createGlobalNumbering();
    return this.#numbering;
  }

  globalToLocalBegin(dat: DataArray, insertMode: InsertMode): void {
    assertMode(insertMode, "write", "CK3002", "global-to-local");
    if (this.comm.size === 1) return;
    this.#exchange(dat, "forward", "begin");
  }

  globalToLocalEnd(dat: DataArray, insertMode: InsertMode): void {
    assertMode(insertMode, "write", "CK3002", "global-to-local");
    if (this.comm.size === 1) return;
    this.#exchange(dat, "forward", "end");
  }

  localToGlobalBegin(dat: DataArray, insertMode: InsertMode): void {
    assertMode(insertMode, "inc", "CK3003", "local-to-global");
    if (this.comm.size === 1) return;
    this.#exchange(dat, "reverse", "begin");
  }

  localToGlobalEnd(dat: DataArray, insertMode: InsertMode): void {
    assertMode(insertMode, "inc", "CK3003", "local-to-global");
    if (this.comm.size === 1) return;
    this.#exchange(dat, "reverse", "end");
  }

  #exchange(dat: DataArray, direction: Direction, phase: "begin" | "end"): void {
    const unit = this.#datatypes.get(dat.dtype, dat.cdim);
    const sf = this.sf;
    const buf = dat.data;
    if (direction === "forward") {
      if (phase === "begin") sf.bcastBegin(unit, buf, buf);
      else sf.bcastEnd(unit, buf, buf);
      return;
    }
    if (phase === "begin") sf.reduceBegin(unit, buf, buf, "sum");
    else sf.reduceEnd(unit, buf, buf, "sum");
  }
}

function assertMode(
  actual: InsertMode,
  expected: InsertMode,
  code: "CK3002" | "CK3003",
  direction: string
): void {
  if (actual !== expected) {
    fail(code, `Only '${expected}' is supported for ${direction} exchange (got '${actual}').`);
  }
}
