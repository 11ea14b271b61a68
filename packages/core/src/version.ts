/**
 * Package version reported by `keygate --version`, `GET /` and `/api/info`
 * when APP_VERSION is not set.
 */

export const VERSION = '0.1.0';
