import type { InputFormat } from '../core/types.js';
import type { ITagger } from './ITagger.js';
import { JsonTagger } from './JsonTagger.js';
import { KeyValueTagger } from './KeyValueTagger.js';
import { SyslogTagger } from './SyslogTagger.js';
import { CsvTagger } from './CsvTagger.js';

/**
 * Tagger registry keyed by input format.
 * Taggers are stateless, so one shared instance per format is enough.
 */
export class TaggerFactory {
  private static readonly registry = new Map<InputFormat, ITagger>([
    ['json', new JsonTagger()],
    ['keyvalue', new KeyValueTagger()],
    ['syslog', new SyslogTagger()],
    ['csv', new CsvTagger()],
  ]);

  /**
   * Replace the tagger for a format (e.g. a vendor-specific syslog dialect).
   */
  static register(format: InputFormat, tagger: ITagger): void {
    if (tagger.format !== format) {
      throw new Error(`Tagger format mismatch: expected "${format}", got "${tagger.format}"`);
    }
    this.registry.set(format, tagger);
  }

  /**
   * @throws Error if no tagger handles the format
   */
  static getTagger(format: InputFormat): ITagger {
    const tagger = this.registry.get(format);
    if (!tagger) {
      const available = Array.from(this.registry.keys()).join(', ');
      throw new Error(`Unknown input format: "${format}". Available formats: ${available}`);
    }
    return tagger;
  }

  static getAvailableFormats(): InputFormat[] {
    return Array.from(this.registry.keys());
  }
}
