export { InstrumentResolver, isExchange, DEFAULT_MEMO_SIZE } from './resolver';
export { SymbolMaster, parseSymbolMaster, parseDescriptionExpiry } from './symbol-master';
export { decomposeOptionSymbol } from './option-symbol';
export { refreshSymbolMaster } from './refresh';
export type { RefreshReport, RefreshOptions } from './refresh';
export type {
  BrokerIdsResult,
  BrokerSegment,
  OptionDescriptor,
  ResolvedInstrument,
  ResolveFailureReason,
  ResolveRequest,
  ResolveResult,
  SymbolMasterRow,
} from './types';
