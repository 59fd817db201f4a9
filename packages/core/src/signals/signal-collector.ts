import type { EntityAccessor } from '../host/entity-accessor.js';
import type { HostRecord, Vec3 } from '../host/fields.js';
import { ZERO_POSITION } from '../host/fields.js';
import { SIGNAL_STATE_FIELDS, decodeSignalRecord } from '../host/records.js';

/** 1 proceed, 0 stop, -1 unknown. */
export type SignalAspect = 1 | 0 | -1;

export const SIGNAL_UNKNOWN: SignalAspect = -1;

export interface SignalState {
  readonly id: number;
  readonly position: Vec3;
  readonly state: SignalAspect;
}

export function readSignalAspect(component: HostRecord | undefined): SignalAspect {
  if (!component) {
    return SIGNAL_UNKNOWN;
  }
  for (const field of SIGNAL_STATE_FIELDS) {
    const value = component[field];
    if (typeof value === 'boolean') {
      return value ? 1 : 0;
    }
    if (typeof value === 'number' && Number.isFinite(value)) {
      return value > 0 ? 1 : 0;
    }
  }
  return SIGNAL_UNKNOWN;
}

export function collectSignals(accessor: EntityAccessor, coordinateDigits = 2): SignalState[] {
  return accessor.enumerate('signal').map((id) => {
    const record = decodeSignalRecord(id, accessor.getEntity(id), coordinateDigits);
    return {
      id,
      position: record.position ?? ZERO_POSITION,
      state: readSignalAspect(accessor.getComponent(id, 'SIGNAL')),
    };
  });
}
