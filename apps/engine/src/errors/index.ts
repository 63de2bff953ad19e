export { AlreadyExistsError } from './already-exists.error';
export { NotFoundError } from './not-found.error';
export { ReconciliationMismatchError } from './reconciliation-mismatch.error';
export { ConfigError } from './config.error';
export { TransientStoreError, isTransientFailure, toStoreError } from '@runledger/sdk';
export { InvalidArgumentError } from './invalid-argument.error';
