export type { IComponentSource } from './IComponentSource';
