export type { Broker, CloseResult, ModifyResult, PositionQuery, SubmitResult } from './broker.js';
export { Executor, type EntrySettings, type ExecutorOptions, type ManageSummary, type SignalOutcome } from './executor.js';
export { PaperBroker, type PaperBrokerOptions, type PaperModification } from './paperBroker.js';
export { TerminalBroker, TRADE_RETCODE_DONE, type TerminalBrokerOptions } from './terminalBroker.js';
