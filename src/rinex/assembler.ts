/**
 * Folds parsed records into the time × satellite tables of a dataset.
 *
 * Times, satellites and fields are interned to integer slots as they are
 * first seen; values are stored per (time, satellite) cell so a duplicate
 * record can replace the whole cell.
 */

import type { EpochLabel } from './epochTime.js';
import type { DataMatrix, DecodeWarning } from './types.js';

type Cell = Map<number, number>;

export interface AssembledTables {
  time: EpochLabel[];
  sv: string[];
  dataVars: Record<string, DataMatrix>;
  timeVars: Record<string, (number | null)[]>;
}

class SlotTable<K> {
  private readonly index = new Map<K, number>();
  readonly keys: K[] = [];

  slot(key: K): number {
    let slot = this.index.get(key);
    if (slot === undefined) {
      slot = this.keys.length;
      this.index.set(key, slot);
      this.keys.push(key);
    }
    return slot;
  }

  get size(): number {
    return this.keys.length;
  }
}

export class DatasetBuilder {
  private readonly times = new SlotTable<EpochLabel>();
  private readonly satellites = new SlotTable<string>();
  private readonly fields = new SlotTable<string>();
  private readonly timeFields = new SlotTable<string>();
  private readonly cells = new Map<number, Map<number, Cell>>();
  private readonly timeValues = new Map<number, Map<number, number | null>>();
  private lastEpoch: EpochLabel | null = null;

  constructor(private readonly warn: (warning: DecodeWarning) => void) {}

  /** Make a field part of the output even if no record ever sets it. */
  declareField(name: string): void {
    this.fields.slot(name);
  }

  /**
   * Note an epoch in file order. Epochs earlier than the previous one are
   * accepted but reported.
   */
  beginEpoch(time: EpochLabel, line: number): void {
    if (this.lastEpoch !== null && time < this.lastEpoch) {
      this.warn({
        code: 'NON_MONOTONIC_EPOCH',
        message: `Epoch ${time} follows ${this.lastEpoch}`,
        line,
        time,
      });
    }
    this.lastEpoch = time;
    this.times.slot(time);
  }

  /** Store one satellite's values at a time; a second record for the same cell replaces the first. */
  addRecord(time: EpochLabel, sv: string, values: Readonly<Record<string, number>>, line: number): void {
    const timeSlot = this.times.slot(time);
    const svSlot = this.satellites.slot(sv);
    let row = this.cells.get(timeSlot);
    if (!row) {
      row = new Map();
      this.cells.set(timeSlot, row);
    }
    if (row.has(svSlot)) {
      this.warn({
        code: 'DUPLICATE_RECORD',
        message: `Second record for ${sv} at ${time} replaces the first`,
        line,
        sv,
        time,
      });
    }

    const cell: Cell = new Map();
    for (const [name, value] of Object.entries(values)) {
      cell.set(this.fields.slot(name), value);
    }
    row.set(svSlot, cell);
  }

  setTimeValue(time: EpochLabel, name: string, value: number | null): void {
    const timeSlot = this.times.slot(time);
    let row = this.timeValues.get(timeSlot);
    if (!row) {
      row = new Map();
      this.timeValues.set(timeSlot, row);
    }
    row.set(this.timeFields.slot(name), value);
  }

  get epochCount(): number {
    return this.times.size;
  }

  finalize(): AssembledTables {
    const order = this.times.keys
      .map((label, slot) => ({ label, slot }))
      .sort((a, b) => (a.label < b.label ? -1 : a.label > b.label ? 1 : 0));
    const svCount = this.satellites.size;

    const dataVars: Record<string, DataMatrix> = {};
    this.fields.keys.forEach((name, fieldSlot) => {
      dataVars[name] = order.map(({ slot }) => {
        const row = this.cells.get(slot);
        const values: (number | null)[] = Array.from({ length: svCount }, () => null);
        if (row) {
          for (const [svSlot, cell] of row) {
            values[svSlot] = cell.get(fieldSlot) ?? null;
          }
        }
        return values;
      });
    });

    const timeVars: Record<string, (number | null)[]> = {};
    this.timeFields.keys.forEach((name, fieldSlot) => {
      timeVars[name] = order.map(({ slot }) => this.timeValues.get(slot)?.get(fieldSlot) ?? null);
    });

    return {
      time: order.map(({ label }) => label),
      sv: [...this.satellites.keys],
      dataVars,
      timeVars,
    };
  }
}
