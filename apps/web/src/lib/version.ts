/**
 * Version constant, read from the web package's package.json.
 *
 * @module version
 */

import packageJson from "../../package.json";

export const APP_VERSION = packageJson.version;
