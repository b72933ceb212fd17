import { AuditConfig, AuditConfigSchema } from "./auditConfig";
import { readJson } from "../utils/fs";
import { formatZodIssues } from "../validation/zodIssues";

export async function loadConfig(configPath: string): Promise<AuditConfig> {
  const data = await readJson(configPath);
  const result = AuditConfigSchema.safeParse(data);
  if (!result.success) {
    throw new Error(`Invalid config ${configPath}: ${formatZodIssues(result.error)}`);
  }
  return result.data;
}
