export type WarningSeverity = "info" | "warning" | "error";

export type WarningCode = "RATE_PARSE_FAILED";

export interface NormalizationWarning {
  code: WarningCode;
  message: string;
  severity: WarningSeverity;
}
