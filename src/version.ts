/** Package version, sent in the `user-agent` header. Keep in sync with package.json. */
export const VERSION = '0.1.0';
