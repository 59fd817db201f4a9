import type { HostCapabilities } from '../host/capability-probe.js';
import { ENUMERABLE_KINDS } from '../host/host-api.js';

export interface CapabilityReportContext {
  readonly coreVersion: string;
  readonly schemaVersion: number;
  /** Label of the enumerator that produced vehicle ids on the first cycle. */
  readonly vehicleSource?: string;
  readonly vehicleCount?: number;
}

function section(title: string, lines: readonly string[]): string[] {
  return [`[${title}]`, ...(lines.length > 0 ? lines : ['  (none)']), ''];
}

/**
 * Plain-text summary of what the host offered at startup. Written once so a
 * broken host version can be diagnosed from the output directory alone.
 */
export function renderCapabilityReport(
  capabilities: HostCapabilities,
  context: CapabilityReportContext,
): string {
  const lines: string[] = [
    'transit telemetry capability report',
    `core ${context.coreVersion}, schema ${context.schemaVersion}`,
    '',
  ];

  lines.push(...section('available', capabilities.available.map((name) => `  + ${name}`)));
  lines.push(...section('missing', capabilities.missing.map((name) => `  - ${name}`)));
  lines.push(
    ...section(
      'enumerators',
      ENUMERABLE_KINDS.map((kind) => {
        const labels = capabilities.enumerators[kind].map((candidate) => candidate.label);
        return `  ${kind}: ${labels.length > 0 ? labels.join(', ') : '(none)'}`;
      }),
    ),
  );
  lines.push(
    ...section(
      'entity types',
      capabilities.entityTypeNames.map((name) => `  ${name}`),
    ),
  );
  lines.push(
    ...section(
      'component types',
      capabilities.componentTypeNames.map((name) => `  ${name}`),
    ),
  );

  const vehicleLine =
    context.vehicleSource === undefined
      ? '  no enumerator returned vehicles'
      : `  ${context.vehicleSource} (${context.vehicleCount ?? 0} ids)`;
  lines.push(...section('vehicle source', [vehicleLine]));

  return lines.join('\n');
}
