/**
 * Automation adapter factory. Returns undefined when AUTOMATION_URL is unset (delegation disabled).
 */

import type { AppConfig } from "../../config";
import type { IAutomation } from "./types";
import { HttpAutomation } from "./http";

export type { IAutomation, AutomationTask, AutomationReceipt, SubmitOptions } from "./types";
export { HttpAutomation } from "./http";

export function createAutomation(config: AppConfig): IAutomation | undefined {
  const { baseUrl, token } = config.automation;
  if (!baseUrl) return undefined;
  return new HttpAutomation({ baseUrl, token });
}
