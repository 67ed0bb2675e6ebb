export {
  classifyGroup,
  labelFor,
  groupId,
  groupResults,
  rowId,
  rowPrefix,
  type GroupClassification,
  type GroupSummary,
  type ResultRow,
  type RowPrefix,
} from './groupResults';
export { summarizeRun } from './runSummary';
