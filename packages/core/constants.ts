/**
 * Shared constants for the cmdlink project layout.
 *
 * The project directory holds the alias config and the bins directory
 * that is expected to be on the user's PATH.
 */

/** Project directory name (relative to home) */
export const PROJECT_DIRNAME = ".cmdlink"

/** Alias config file inside the project directory */
export const CONFIG_FILENAME = "config.toml"

/** Directory of generated shims inside the project directory */
export const BINS_DIRNAME = "bins"

/** Environment variable that overrides the project directory */
export const HOME_ENV_VAR = "CMDLINK_HOME"
