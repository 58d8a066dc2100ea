// State handlers barrel export
export { ObserveHandler } from './ObserveHandler';
export { DecideHandler } from './DecideHandler';
export { ResolveHandler } from './ResolveHandler';
export { InvokeHandler, NO_CHANGE_AFTER_SCROLL } from './InvokeHandler';
export { RecoverHandler, TIMEOUT_WITH_CHANGE } from './RecoverHandler';
export { RecordHandler } from './RecordHandler';
