/**
 * Payload taggers - serialize synthetic events per input format with the tracking token embedded.
 */

export type { ITagger, TagContext } from './ITagger.js';
export { TaggerFactory } from './TaggerFactory.js';
export { JsonTagger } from './JsonTagger.js';
export { KeyValueTagger } from './KeyValueTagger.js';
export { SyslogTagger, TRACKING_SD_ID } from './SyslogTagger.js';
export { CsvTagger } from './CsvTagger.js';
