/** Reported by `--version`. Keep in step with package.json. */
export const VERSION = '1.0.0'
