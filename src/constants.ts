export const GIT_CONSTANTS = {
  REMOTE_NAME: "origin",
  REMOTE_PREFIX: "origin/",
  DEFAULT_BRANCH: "main",
  HEAD: "HEAD",
  REFS: {
    HEADS: "refs/heads/",
    TAGS: "refs/tags/",
    REMOTES_ORIGIN: "refs/remotes/origin/",
  },
  FETCH_CONFIG: {
    MIRROR: "+refs/*:refs/*",
    BARE: "+refs/heads/*:refs/heads/*",
    WORKING: "+refs/heads/*:refs/remotes/origin/*",
  },
  // Push URL written into mirrors so they can never be used as push targets
  DISABLED_PUSH_URL: "no_push",
} as const;

export const DEFAULT_CONFIG = {
  CRON_SCHEDULE: "0 * * * *",
  DEFAULT_BRANCH: "main",
  METADATA_DIR_NAME: ".fleet",
  RETRY: {
    MAX_ATTEMPTS: 3,
    INITIAL_DELAY_MS: 60000,
    MAX_DELAY_MS: 240000,
    BACKOFF_MULTIPLIER: 2,
    JITTER_MS: 0,
  },
  OPERATION_TIMEOUT_MS: 30 * 60 * 1000,
  FAILURE_THRESHOLD: 3,
  COMMIT_CACHE_LIMIT: 1000,
  PARALLELISM: {
    MAX_REPOSITORIES: 2,
  },
} as const;

export const ERROR_MESSAGES = {
  PERMISSION_DENIED: [
    "Authentication failed",
    "Permission denied",
    "could not read Username",
    "could not read Password",
    "The requested URL returned error: 401",
    "The requested URL returned error: 403",
  ],
  NETWORK_FAILURE: [
    "Could not resolve host",
    "Could not read from remote repository",
    "fatal: unable to access",
    "Connection timed out",
    "Connection refused",
    "Operation timed out",
    "early EOF",
    "the remote end hung up unexpectedly",
    "RPC failed",
  ],
  REMOTE_NOT_FOUND: ["Repository not found", "does not appear to be a git repository", "not found"],
  CHECKOUT_CONFLICT: ["is already checked out at", "is already used by worktree", "already exists"],
  DIRTY_WORKDIR: ["would be overwritten by checkout", "Please commit your changes or stash them"],
  TRANSIENT_FS_CODES: ["EBUSY", "EAGAIN", "ETIMEDOUT", "ECONNRESET", "ECONNREFUSED", "ENOTFOUND"],
} as const;

export const NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export const SHA_PATTERN = /^[0-9a-fA-F]{4,64}$/;
