export { ShrineRepository } from './shrine.repository.js';
export type { ShrineRepositoryOptions } from './shrine.repository.js';
export type { DumpEntry, ImportResult, InitResult, OpenShrine, RekeyResult, ShrineInfo } from './shrine.model.js';
export type { ImportSecretsInput, InitShrineInput } from './shrine.schema.js';
