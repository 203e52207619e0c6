import { uninstallStep } from "./uninstall.js";
import { freezeStep } from "./freeze.js";
import { distributeStep } from "./distribute.js";
import { installStep } from "./install.js";
import { RELEASE_STEPS, type ReleaseStep, type ReleaseStepDef } from "./types.js";

export * from "./types.js";
export { hiddenImportArgs } from "./freeze.js";

const STEP_DEFS: Record<ReleaseStep, ReleaseStepDef> = {
  uninstall: uninstallStep,
  freeze: freezeStep,
  distribute: distributeStep,
  install: installStep,
};

/** Step definitions in execution order. */
export function releaseSteps(): ReleaseStepDef[] {
  return RELEASE_STEPS.map((id) => STEP_DEFS[id]);
}
