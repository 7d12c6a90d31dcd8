export { ExitCode, exitCodeFor, formatRunReport, reportRun } from './report.js';
