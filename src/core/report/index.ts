export {
  renderConditionTable,
  renderCandidateTable,
  renderFindings,
  renderExecutiveSummary,
  renderDataCard,
  formatGeneratedAt,
  adoptionText,
} from './markdown.js';
export type { ReportContext } from './markdown.js';
export { writeReports, writeConditionSummaryCsv, formatConditionSummaryCsv, SUMMARY_CSV_FIELDS } from './writer.js';
