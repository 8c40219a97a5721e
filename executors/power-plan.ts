import { errnoCode, errorMessage } from "../core/errors.js";
import type { SystemControl } from "./system-control.js";
import type { StepResult } from "./terminate-process.js";

export async function setPowerPlan(plan: string, control: SystemControl): Promise<StepResult> {
  try {
    await control.setPowerPlan(plan);
    return { code: "ok", message: `power plan set to ${plan}` };
  } catch (err) {
    const code = errnoCode(err);
    if (code === "EPERM" || code === "EACCES") {
      return { code: "permission_denied", message: `permission denied changing the power plan to ${plan}; rerun with administrator rights` };
    }
    return { code: "execution_failed", message: `failed to set power plan ${plan}: ${errorMessage(err)}` };
  }
}
