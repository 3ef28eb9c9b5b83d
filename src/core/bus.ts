/**
 * Data-bus: the typed carrier of one run's state.
 *
 * Values accumulate under the fixed keys of {@link BusShape}. A stage never
 * sees the builder itself, only a frozen view holding exactly the keys it
 * declared it requires.
 */
import type { Settings } from "./settings.js";
import type { CleanReport, LoadReport, StageName, Table } from "./types.js";
import { MissingKeyError } from "./exceptions.js";

export interface BusShape {
  readonly settings: Settings;
  readonly runId: string;
  readonly runStartedAt: Date;
  /** Raw source payload(s), as received. */
  readonly response: unknown;
  readonly raw: Table;
  readonly rawPath: string;
  readonly clean: Table;
  readonly cleanReport: CleanReport;
  readonly cleanPath: string;
  readonly loaded: LoadReport;
}

export type BusKey = keyof BusShape;

/** What a stage receives: only the keys it declared. */
export type BusView<K extends BusKey> = Pick<BusShape, K>;

type BusValues = { -readonly [P in BusKey]?: BusShape[P] };

function hasKeys<K extends BusKey>(
  values: BusValues,
  keys: readonly K[],
): values is BusValues & Pick<BusShape, K> {
  return keys.every((key) => values[key] !== undefined);
}

export class DataBus {
  private readonly values: BusValues = {};
  private readonly order: BusKey[] = [];

  /** Keys currently set, in the order they were first written. */
  keys(): BusKey[] {
    return [...this.order];
  }

  has(key: BusKey): boolean {
    return this.values[key] !== undefined;
  }

  /** Current value of `key`, for reporting. Stages read through {@link view}. */
  get<K extends BusKey>(key: K): BusShape[K] | undefined {
    return this.values[key];
  }

  /**
   * Frozen view of `keys` for `stage`.
   * @throws MissingKeyError naming the first absent key.
   */
  view<K extends BusKey>(stage: StageName, keys: readonly K[]): BusView<K> {
    const out: BusValues = {};
    for (const key of keys) out[key] = this.values[key];
    if (!hasKeys(out, keys)) {
      const missing = keys.find((key) => out[key] === undefined);
      throw new MissingKeyError(stage, String(missing));
    }
    Object.freeze(out);
    return out;
  }

  /**
   * Merge a stage's output. Every key the stage promised must be present.
   * @throws MissingKeyError when a promised key was not returned.
   */
  merge<K extends BusKey>(
    stage: StageName,
    keys: readonly K[],
    output: Pick<BusShape, K>,
  ): void {
    for (const key of keys) {
      if (output[key] === undefined) throw new MissingKeyError(stage, key);
    }
    for (const key of keys) {
      if (!this.order.includes(key)) this.order.push(key);
      this.values[key] = output[key];
    }
  }
}
