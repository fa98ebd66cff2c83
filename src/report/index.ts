export { renderReport, resolveReportDate, uniqueReportPath, writeReport } from "./report";
export type { PartiesByOpinion, ReportDependencies, ReportOptions, ReportResult } from "./report";
