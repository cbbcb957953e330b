import type { CubeRecord } from '../models/record.js';
import type { KnownSpecimenType } from '../models/specimen-type.js';
import { classifySpecimenType } from './type-classifier.js';

export interface GroupedRecords {
  readonly groups: Readonly<Record<KnownSpecimenType, readonly CubeRecord[]>>;
  readonly unrecognized: readonly CubeRecord[];
}

/** Stable partition by specimen type. Every known type is present, possibly empty. */
export function groupBySpecimenType(records: readonly CubeRecord[]): GroupedRecords {
  const groups: Record<KnownSpecimenType, CubeRecord[]> = {
    '45D': [],
    '60D': [],
    '45DWP': [],
    '60DWP': [],
  };
  const unrecognized: CubeRecord[] = [];

  for (const record of records) {
    const type = classifySpecimenType(record.markPrefix);
    if (type === 'Unknown') {
      unrecognized.push(record);
    } else {
      groups[type].push(record);
    }
  }

  return { groups, unrecognized };
}
