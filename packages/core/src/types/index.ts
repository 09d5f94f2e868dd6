export type { Record, WriteResult } from './record.js';
