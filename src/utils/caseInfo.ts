import type { CaseInfo } from "../db/types";

/** Trailing ", SJC-<digits>" docket suffix used in oral argument titles */
export const DOCKET_PATTERN = /^(.+),\s*(SJC-\d+)$/;

/**
 * Splits an oral argument title into case name and docket number.
 * @example
 * parseCaseInfo("Commonwealth v. Emilio Delarosa, SJC-13444")
 * // returns { case_name: "Commonwealth v. Emilio Delarosa", docket: "SJC-13444" }
 * parseCaseInfo("Annual State of the Judiciary")
 * // returns { case_name: "Annual State of the Judiciary", docket: null }
 */
export function parseCaseInfo(title: string): CaseInfo {
  const match = DOCKET_PATTERN.exec(title);

  if (match) {
    const [, caseName, docket] = match;
    return { case_name: caseName.trim(), docket };
  }

  return { case_name: title, docket: null };
}
