import type { EntityAccessor } from '../host/entity-accessor.js';
import type { HostRecord, Vec3 } from '../host/fields.js';
import { ZERO_POSITION, firstPresent, isHostRecord, toEntityId } from '../host/fields.js';
import { decodeStationGroupRecord, decodeStationRecord } from '../host/records.js';
import { boundedSearch } from '../traversal/bounded-search.js';
import { findNameDeep, isUsableName } from './names.js';

export interface Station {
  readonly id: number;
  readonly name: string;
  readonly position: Vec3;
  readonly isGroup: boolean;
}

export interface StationResolution {
  readonly stationId: number;
  readonly resolved: boolean;
}

export interface StopStation extends StationResolution {
  readonly rawStopId: number;
}

export interface StationIndexOptions {
  readonly nameSearchDepth: number;
  readonly stationSearchDepth: number;
  readonly coordinateDigits: number;
}

/** Fields of an unknown entity that may point at its owning station. */
export const STATION_REFERENCE_FIELDS = [
  'station',
  'stationGroup',
  'stationEntity',
  'owner',
  'parent',
  'group',
] as const;

/** Fields of a stop record that carry its raw stop id. */
export const STOP_ID_FIELDS = [
  'stationEntity',
  'stationEntityId',
  'station',
  'stationId',
  'terminalEntity',
  'terminalEntityId',
  'stopEntity',
  'stopEntityId',
  'stop',
  'stopId',
  'entity',
  'id',
] as const;

/** Keys inspected first when searching a stop record for a station id. */
export const STATION_SEARCH_KEYS = [
  'stationEntity',
  'stationEntityId',
  'station',
  'stationId',
  'station_id',
  'terminalEntity',
  'terminalEntityId',
  'terminal',
  'terminalId',
  'entity',
  'entityId',
  'id',
] as const;

const DEFAULT_INDEX_OPTIONS: StationIndexOptions = {
  nameSearchDepth: 4,
  stationSearchDepth: 5,
  coordinateDigits: 2,
};

function registerFirst(aliases: Map<number, number>, alias: number, stationId: number): void {
  if (alias > 0 && alias !== stationId && !aliases.has(alias)) {
    aliases.set(alias, stationId);
  }
}

/**
 * Canonical stations of one snapshot cycle plus the terminal and group alias
 * maps that point other ids at them. Rebuilt from scratch every cycle.
 */
export class StationResolver {
  private readonly entityMemo = new Map<number, HostRecord | undefined>();

  constructor(
    private readonly accessor: EntityAccessor | undefined,
    private readonly stations: ReadonlyMap<number, Station>,
    private readonly terminalAliases: Map<number, number>,
    private readonly groupAliases: Map<number, number>,
    private readonly options: StationIndexOptions = DEFAULT_INDEX_OPTIONS,
    prefetched: ReadonlyMap<number, HostRecord | undefined> = new Map(),
  ) {
    for (const [id, record] of prefetched) {
      this.entityMemo.set(id, record);
    }
  }

  static empty(accessor?: EntityAccessor, options?: StationIndexOptions): StationResolver {
    return new StationResolver(accessor, new Map(), new Map(), new Map(), options);
  }

  get size(): number {
    return this.stations.size;
  }

  listStations(): Station[] {
    return [...this.stations.values()];
  }

  getStation(id: number): Station | undefined {
    return this.stations.get(id);
  }

  /**
   * Host entity by id, fetched at most once per cycle.
   */
  entity(id: number): HostRecord | undefined {
    if (id <= 0 || !this.accessor) {
      return undefined;
    }
    if (this.entityMemo.has(id)) {
      return this.entityMemo.get(id);
    }
    const record = this.accessor.getEntity(id);
    this.entityMemo.set(id, record);
    return record;
  }

  resolve(id: number): StationResolution {
    if (id <= 0) {
      return { stationId: id, resolved: false };
    }
    if (this.stations.has(id)) {
      return { stationId: id, resolved: true };
    }
    const viaGroup = this.groupAliases.get(id);
    if (viaGroup !== undefined) {
      return { stationId: viaGroup, resolved: true };
    }
    const viaTerminal = this.terminalAliases.get(id);
    if (viaTerminal !== undefined) {
      return { stationId: viaTerminal, resolved: true };
    }
    const record = this.entity(id);
    if (record) {
      for (const field of STATION_REFERENCE_FIELDS) {
        const referenced = toEntityId(record[field]);
        if (referenced <= 0) {
          continue;
        }
        const stationId = this.stations.has(referenced)
          ? referenced
          : this.groupAliases.get(referenced);
        if (stationId !== undefined) {
          this.terminalAliases.set(id, stationId);
          return { stationId, resolved: true };
        }
      }
    }
    return { stationId: id, resolved: false };
  }

  /**
   * Canonical station id for `id`, or `id` itself when nothing resolves.
   */
  resolveToStationId(id: number): number {
    return this.resolve(id).stationId;
  }

  /**
   * Searches nested stop data for any number that resolves to a station.
   */
  findStationIdDeep(root: unknown): number | undefined {
    return boundedSearch<number>(
      root,
      (value) => {
        if (typeof value !== 'number' || !Number.isFinite(value)) {
          return undefined;
        }
        const resolution = this.resolve(Math.floor(value));
        return resolution.resolved ? resolution.stationId : undefined;
      },
      { maxDepth: this.options.stationSearchDepth, preferredKeys: STATION_SEARCH_KEYS },
    );
  }

  extractStopStation(stop: unknown): StopStation {
    if (typeof stop === 'number' && Number.isFinite(stop)) {
      const rawStopId = Math.floor(stop);
      return { ...this.resolve(rawStopId), rawStopId };
    }
    if (!isHostRecord(stop)) {
      return { stationId: 0, rawStopId: 0, resolved: false };
    }
    const rawStopId = toEntityId(firstPresent(stop, STOP_ID_FIELDS));
    const direct = this.resolve(rawStopId);
    if (direct.resolved) {
      return { ...direct, rawStopId };
    }
    const deep = this.findStationIdDeep(stop);
    if (deep !== undefined) {
      return { stationId: deep, rawStopId, resolved: true };
    }
    return { stationId: rawStopId, rawStopId, resolved: false };
  }

  get nameSearchDepth(): number {
    return this.options.nameSearchDepth;
  }
}

/**
 * Enumerates stations and station groups and builds the cycle's resolver.
 */
export function buildStationIndex(
  accessor: EntityAccessor,
  options: StationIndexOptions = DEFAULT_INDEX_OPTIONS,
): StationResolver {
  const stations = new Map<number, Station>();
  const terminalAliases = new Map<number, number>();
  const groupAliases = new Map<number, number>();
  const fetched = new Map<number, HostRecord | undefined>();

  for (const id of accessor.enumerate('station')) {
    if (stations.has(id)) {
      continue;
    }
    const raw = accessor.getEntity(id);
    fetched.set(id, raw);
    const record = raw ? decodeStationRecord(id, raw, options.coordinateDigits) : undefined;
    const explicitName = record?.name;
    const name =
      (explicitName !== undefined && isUsableName(explicitName) ? explicitName : undefined) ??
      findNameDeep(raw, options.nameSearchDepth) ??
      `Station #${id}`;

    stations.set(id, {
      id,
      name,
      position: record?.position ?? ZERO_POSITION,
      isGroup: record?.stationIds !== undefined,
    });

    if (record) {
      for (const memberId of record.memberIds) {
        registerFirst(terminalAliases, memberId, id);
      }
      for (const memberId of record.stationIds ?? []) {
        registerFirst(terminalAliases, memberId, id);
      }
      if (record.groupId !== undefined) {
        registerFirst(groupAliases, record.groupId, id);
      }
    }
  }

  for (const groupId of accessor.enumerate('stationGroup')) {
    const raw = accessor.getEntity(groupId);
    fetched.set(groupId, raw);
    if (!raw || stations.has(groupId)) {
      continue;
    }
    const group = decodeStationGroupRecord(groupId, raw);
    const member = group.stationIds.find((stationId) => stations.has(stationId));
    if (member !== undefined) {
      registerFirst(groupAliases, groupId, member);
    }
  }

  return new StationResolver(accessor, stations, terminalAliases, groupAliases, options, fetched);
}
