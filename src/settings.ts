/**
 * Name under which the platform is registered; `platform` in config.json must match.
 */
export const PLATFORM_NAME = 'AcInfinity'

/**
 * Must match the `name` field in package.json.
 */
export const PLUGIN_NAME = 'homebridge-ac-infinity-cloud'

export const DEFAULT_HOST = 'http://www.acinfinityserver.com'

export const DEFAULT_POLLING_INTERVAL_SECONDS = 10
export const MIN_POLLING_INTERVAL_SECONDS = 5

export const REQUEST_TIMEOUT_MS = 10_000

// The vendor rejects longer passwords; its mobile apps truncate to this length.
export const MAX_PASSWORD_LENGTH = 25

export const RETRY_ATTEMPTS = 3
export const RETRY_DELAY_MS = 1000

export const API_SUCCESS_CODE = 200
