// Kept in TS so production builds don't depend on copying .sql files into dist/.
export const SCHEMA_SQL = `
-- Telegram users. The step column is the conversation state ("home", "get_episode:12", ...).
CREATE TABLE IF NOT EXISTS users (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  telegram_user_id INTEGER NOT NULL UNIQUE,
  username TEXT,
  first_name TEXT,
  last_name TEXT,
  step TEXT NOT NULL DEFAULT 'home' CHECK (length(step) > 0),
  is_active INTEGER NOT NULL DEFAULT 1,
  is_superuser INTEGER NOT NULL DEFAULT 0,
  subscription_expires_at INTEGER,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);

-- A shareable movie or series.
CREATE TABLE IF NOT EXISTS content_sessions (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  title TEXT NOT NULL,
  content_type TEXT NOT NULL CHECK (content_type IN ('movie', 'series')),
  link TEXT NOT NULL UNIQUE,
  views INTEGER NOT NULL DEFAULT 0,
  likes INTEGER NOT NULL DEFAULT 0,
  dislikes INTEGER NOT NULL DEFAULT 0,
  created_at INTEGER NOT NULL
);

-- One uploaded file of a session, stored as a message in the backup channel.
CREATE TABLE IF NOT EXISTS episodes (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  session_id INTEGER NOT NULL,
  link TEXT NOT NULL UNIQUE,
  message_id INTEGER NOT NULL,
  media_kind TEXT,
  episode_order INTEGER NOT NULL,
  created_at INTEGER NOT NULL,
  CONSTRAINT fk_episodes_session FOREIGN KEY (session_id) REFERENCES content_sessions (id) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS plans (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  title TEXT NOT NULL,
  price INTEGER NOT NULL,
  duration_days INTEGER NOT NULL,
  is_active INTEGER NOT NULL DEFAULT 1
);

-- Channels users must join. Rows flagged "other" are listed but never checked.
CREATE TABLE IF NOT EXISTS sponsor_channels (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT,
  chat_id TEXT UNIQUE,
  link TEXT NOT NULL UNIQUE,
  other INTEGER NOT NULL DEFAULT 0
);

-- Single row (id = 1): maintenance switch and the notice shown while it is on.
CREATE TABLE IF NOT EXISTS bot_status (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  is_update INTEGER NOT NULL DEFAULT 0,
  update_msg TEXT NOT NULL DEFAULT 'bot is updated !'
);

-- Operator-editable message texts with {placeholder} substitution.
CREATE TABLE IF NOT EXISTS message_templates (
  name TEXT PRIMARY KEY,
  text TEXT NOT NULL
);

-- Telegram redelivers a webhook update until it sees a 2xx; update_id de-duplicates.
CREATE TABLE IF NOT EXISTS processed_updates (
  update_id INTEGER PRIMARY KEY,
  received_at INTEGER NOT NULL
);
`;
