import type { RawRecord } from '../../schemas/index.js';

/**
 * Parsed CSV file
 */
export interface CsvTable {
  /** Header cells in file order, untrimmed */
  columns: string[];
  /** One record per data row */
  records: RawRecord[];
}
