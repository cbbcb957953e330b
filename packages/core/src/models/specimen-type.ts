export type KnownSpecimenType = '45D' | '60D' | '45DWP' | '60DWP';

export type SpecimenType = KnownSpecimenType | 'Unknown';

/** Fixed group order used for sheets and reports. */
export const SPECIMEN_TYPES: readonly KnownSpecimenType[] = ['45D', '60D', '45DWP', '60DWP'];
