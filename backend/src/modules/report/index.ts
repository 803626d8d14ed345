/**
 * REPORT MODULE — Index
 */

export * from './report.types.js';
export { compileReport, formatTimestamp, reportFileName } from './report.compiler.js';
export { registerReportRoutes } from './report.routes.js';
