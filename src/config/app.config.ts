import { getOptional, parseBoolean } from "../utils/validation";

/**
 * Application configuration
 */
export interface AppConfig {
  /** Status assumed before an issue's first recorded transition */
  initialStatus: string;
  /** Order changelog entries by timestamp before calculating */
  sortChangelog: boolean;
}

/**
 * Retrieves and validates application configuration from environment variables
 */
export function getAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const initialStatus = getOptional(env.INITIAL_STATUS, "To Do").trim();
  const sortChangelog = parseBoolean(
    "SORT_CHANGELOG",
    getOptional(env.SORT_CHANGELOG, "true")
  );

  return {
    initialStatus,
    sortChangelog,
  };
}
