import type { TelemetryFacade } from '../telemetry.js';
import { telemetry as defaultTelemetry } from '../telemetry.js';
import type { HostCapabilities, LookupCandidate } from './capability-probe.js';
import type { HostRecord } from './fields.js';
import { isHostRecord, readList, toEntityId } from './fields.js';
import type { ComponentKind, EnumerableKind, RegionBounds } from './host-api.js';

export interface EnumerationResult {
  readonly ids: readonly number[];
  /** Label of the candidate that produced the ids. */
  readonly source?: string;
}

function toIdList(value: unknown): number[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const ids: number[] = [];
  for (const item of value) {
    const id = toEntityId(item);
    if (id > 0) {
      ids.push(id);
    }
  }
  return ids;
}

/**
 * Read-only facade over the probed host. No method throws: a failing host
 * call is counted against its operation and reads as absent data.
 */
export class EntityAccessor {
  private readonly totals = new Map<string, number>();
  private cycleFailures = new Map<string, number>();
  private failedCalls = 0;

  constructor(
    readonly capabilities: HostCapabilities,
    private readonly telemetry: TelemetryFacade = defaultTelemetry,
  ) {}

  getEntity(id: number): HostRecord | undefined {
    return this.lookupFirst(this.capabilities.entityLookups, id);
  }

  getVehicle(id: number): HostRecord | undefined {
    return this.lookupFirst(this.capabilities.vehicleLookups, id);
  }

  getLine(id: number): HostRecord | undefined {
    return this.lookupFirst(this.capabilities.lineLookups, id);
  }

  enumerate(kind: EnumerableKind): readonly number[] {
    return this.enumerateDetailed(kind).ids;
  }

  enumerateDetailed(kind: EnumerableKind): EnumerationResult {
    for (const candidate of this.capabilities.enumerators[kind]) {
      const ids = toIdList(this.invoke(candidate.label, candidate.list));
      if (ids.length > 0) {
        return { ids, source: candidate.label };
      }
    }
    return { ids: [] };
  }

  get supportsComponents(): boolean {
    return this.capabilities.componentLookup !== undefined;
  }

  getComponent(id: number, kind: ComponentKind): HostRecord | undefined {
    const lookup = this.capabilities.componentLookup;
    if (!lookup) {
      return undefined;
    }
    const type = this.capabilities.componentTypes[kind];
    const component = this.invoke(`${lookup.label}(${kind})`, () => lookup.lookup(id, type));
    return isHostRecord(component) ? component : undefined;
  }

  enumerateRegion(bounds: RegionBounds): readonly number[] {
    const region = this.capabilities.regionEnumerator;
    if (!region) {
      return [];
    }
    return toIdList(this.invoke(region.label, () => region.enumerate(bounds)));
  }

  getGameTime(): unknown {
    for (const clock of this.capabilities.gameClocks) {
      const value = this.invoke(clock.label, clock.read);
      if (value !== undefined && value !== null && value !== false) {
        return value;
      }
    }
    return undefined;
  }

  /**
   * Edge id lists the host publishes for a line, in source order. Only the
   * first line record source that answers is read; `getLineEdges` adds one
   * more list after it.
   */
  getLineEdgeLists(lineId: number): number[][] {
    const lists: number[][] = [];
    let recordRead = false;
    for (const source of this.capabilities.lineEdgeSources) {
      const fields = source.listFields;
      if (fields && recordRead) {
        continue;
      }
      const value = this.invoke(source.label, () => source.read(lineId));
      if (!fields) {
        if (Array.isArray(value)) {
          lists.push(toIdList(value));
        }
        continue;
      }
      if (!isHostRecord(value)) {
        continue;
      }
      recordRead = true;
      for (const field of fields) {
        const list = value[field];
        if (list !== undefined && list !== null && typeof list === 'object') {
          lists.push(toIdList(readList(list)));
        }
      }
    }
    return lists.filter((ids) => ids.length > 0);
  }

  /** Host calls that have thrown since construction. Never reset. */
  get failedCallCount(): number {
    return this.failedCalls;
  }

  failureCounts(): Readonly<Record<string, number>> {
    return Object.fromEntries(this.totals);
  }

  /**
   * Failures recorded since the previous call, for per-cycle counters.
   */
  takeCycleFailures(): Readonly<Record<string, number>> {
    const counts = Object.fromEntries(this.cycleFailures);
    this.cycleFailures = new Map();
    return counts;
  }

  private lookupFirst(
    candidates: readonly LookupCandidate[],
    id: number,
  ): HostRecord | undefined {
    for (const candidate of candidates) {
      const record = this.invoke(candidate.label, () => candidate.lookup(id));
      if (isHostRecord(record)) {
        return record;
      }
    }
    return undefined;
  }

  private invoke(operation: string, call: () => unknown): unknown {
    try {
      return call();
    } catch (error) {
      this.failedCalls += 1;
      const total = (this.totals.get(operation) ?? 0) + 1;
      this.totals.set(operation, total);
      this.cycleFailures.set(operation, (this.cycleFailures.get(operation) ?? 0) + 1);
      if (total === 1) {
        this.telemetry.recordWarning('HostCallFailed', {
          operation,
          message: error instanceof Error ? error.message : String(error),
        });
      }
      return undefined;
    }
  }
}
