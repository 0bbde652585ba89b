export type { IStateStore } from './IStateStore';
