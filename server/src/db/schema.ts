/** SQL schema for the cache containers and user cooldowns. */
export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS cache_containers (
  kind      TEXT PRIMARY KEY,
  version   INTEGER NOT NULL,
  data      TEXT NOT NULL,     -- JSON container
  saved_at  TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE TABLE IF NOT EXISTS user_cooldowns (
  user_id   TEXT NOT NULL,
  action    TEXT NOT NULL,
  used_at   INTEGER NOT NULL,  -- epoch ms
  PRIMARY KEY (user_id, action)
);
`;
