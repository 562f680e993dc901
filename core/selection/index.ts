export { CandidatePool } from './pool';
export type { PoolSource } from './pool';
export { ImageSelector } from './selector';
export type { ImageDecoder, SelectedImage, SelectionOrder, SelectorOptions } from './selector';
