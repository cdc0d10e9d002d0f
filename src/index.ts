export * from './types/index.js';
export * from './inference/index.js';
export * from './gateway/index.js';
export * from './privacy/index.js';
export * from './themes/index.js';
export { buildCoachPrompt } from './prompts/coach.js';
export { buildStudentInsightsPrompt, formatReportDate } from './prompts/student-insights.js';
export { SettingsStore, DEFAULT_SETTINGS_PATH } from './settings/store.js';
export * from './audit/index.js';
export { buildServer, VERSION, type ServerDependencies } from './app.js';
export { adapterDepsFromConfig, loadConfig, parseConfig, originMatchers, type ServerConfig } from './config.js';
export { createLogger, logger, type Logger } from './logger.js';
