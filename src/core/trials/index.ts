export { formatTrialCsv, trialRowToCells, toAnalysisRecord, parseAnalysisRecords, loadAnalysisRecords } from './codec.js';
export { TRIAL_CSV_FIELDS, INT_FIELDS, FLOAT_FIELDS } from './columns.js';
export type { TrialCsvField } from './columns.js';
