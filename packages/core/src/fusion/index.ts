export { fuse } from './fuser';
export { FUSED_COLUMNS, toFusedRow } from './table';
export type { FusedRecord, PowerSample } from './types';
export type { FusedRow } from './table';
