/**
 * Report module.
 * Recording sinks for run artifacts, plus Markdown and stable JSON
 * renderings of a finished run.
 */

export { generateMarkdown, serializeJSON, describeOutcome } from './reporter.js';
export { createFileRecordingSink, createMemoryRecordingSink } from './sink.js';
export type { RecordingSink, MemoryRecordingSink } from './sink.js';
