import { JiraConfig, getJiraConfig } from "./jira.config";
import { AppConfig, getAppConfig } from "./app.config";

/**
 * Complete application configuration
 */
export interface Config {
  jira: JiraConfig;
  app: AppConfig;
}

/**
 * Re-export individual config interfaces for convenience
 */
export type { JiraConfig, AppConfig };

/**
 * Retrieves complete application configuration with validation
 * This is the main entry point for accessing configuration
 */
export function getConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    jira: getJiraConfig(env),
    app: getAppConfig(env),
  };
}

/**
 * Validates that all required configuration is present and valid
 * Throws descriptive errors if configuration is missing or invalid
 */
export function validateConfig(env: NodeJS.ProcessEnv = process.env): Config {
  try {
    return getConfig(env);
  } catch (error) {
    if (error instanceof Error) {
      throw new Error(
        `Configuration Error:\n${error.message}\n\n` +
          `Please check your .env file. See .env.example for reference.`
      );
    }
    throw error;
  }
}
