export { formatResult, renderRows } from './write.js';
export type { FormatOptions, FormatSummary } from './write.js';
export { formatCsvRow, quoteField, cellText, separatorProblem, RECORD_DELIMITER } from './csv.js';
export { openSink, StreamSink, FileSink } from './sink.js';
export type { Sink, SinkTarget } from './sink.js';
