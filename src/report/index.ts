export {
  renderQaReport,
  runQualityChecks,
  countInvalidFaxNumbers,
  checkCleanHeader,
  type QaReportInput,
  type QualityCheck,
} from './qa-report.js'
