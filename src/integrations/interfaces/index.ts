export type { IPmsBackend } from './pms';
