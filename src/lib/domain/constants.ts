export const STATUS_PATH = "/wattbox_info.xml";
export const CONTROL_PATH = "/control.cgi";

/** Minimum interval between unsolicited outlet refreshes. */
export const REFRESH_DEBOUNCE_MS = 3_000;

export const DEFAULT_TIMEOUT_MS = 5_000;

// The firmware expects a millisecond-looking token; it only ever gets whole seconds.
export const TIME_TOKEN_SUFFIX = "999";

export const COMMAND_ON = "1";
export const COMMAND_OFF = "0";
