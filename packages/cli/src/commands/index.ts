export {
  runAnalyzeCommand,
  runAnalysisOnce,
  printCoverage,
  saveReport,
  type AnalysisRequest,
} from './analyze.js';
export { runAppendCommand } from './append.js';
