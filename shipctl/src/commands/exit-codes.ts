/**
 * CLI exit codes. A step whose tool exits non-zero ends the run with that
 * tool's own exit status instead.
 */
export const EXIT = {
  SUCCESS: 0,
  FAILED: 1,
  INVALID_INPUT: 2,
  METADATA_ERROR: 3,
  ARTIFACT_MISSING: 4,
  STEP_TIMEOUT: 5,
} as const;

const BY_CODE: Record<string, number> = {
  CONFIG_INVALID: EXIT.INVALID_INPUT,
  CONFIG_READ_FAILED: EXIT.INVALID_INPUT,
  STEP_RANGE_INVALID: EXIT.INVALID_INPUT,
  RESUME_MISMATCH: EXIT.INVALID_INPUT,
  VERSION_INVALID: EXIT.INVALID_INPUT,
  METADATA_MISSING: EXIT.METADATA_ERROR,
  METADATA_INVALID: EXIT.METADATA_ERROR,
  METADATA_READONLY: EXIT.METADATA_ERROR,
  ENTRY_POINT_MISSING: EXIT.ARTIFACT_MISSING,
  ARTIFACT_MISSING: EXIT.ARTIFACT_MISSING,
  WHEEL_NOT_FOUND: EXIT.ARTIFACT_MISSING,
  STEP_TIMEOUT: EXIT.STEP_TIMEOUT,
};

/** Map an error code (and the failing tool's status, if any) to the process exit code. */
export function exitCodeFor(code: string, toolExitCode?: number): number {
  if (code === "TOOL_FAILED" && toolExitCode !== undefined) {
    return toolExitCode > 0 && toolExitCode < 256 ? toolExitCode : EXIT.FAILED;
  }
  return BY_CODE[code] ?? EXIT.FAILED;
}
