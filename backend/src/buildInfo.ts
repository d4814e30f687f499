/**
 * Process build metadata, logged at startup and served by GET /health
 */

export const buildInfo = {
  service: 'dsc-engine',
  version: process.env.npm_package_version || '0.1.0',
  startedAt: new Date().toISOString(),
  commit: process.env.GIT_COMMIT_SHA || 'unknown',
  node: process.version
};
