/**
 * Formatters Module
 */

export { TextFormatter, SqlRecordFormatter, quoteSqlLiteral } from './recordFormatters.js';
