/**
 * SQLite Adapter
 *
 * Production reminder store on better-sqlite3. One connection in WAL mode;
 * statements are prepared once at construction.
 */
import Database from 'better-sqlite3'
import type { LocalDateTime, NewReminder, Reminder, ReminderStore } from './adapter'
import { decodeRule, encodeRule } from './adapter'
import { InvalidDataError } from './errors'

// ============================================================================
// Extended type for SQLite-specific introspection methods
// ============================================================================

export type SqliteExtras = {
  listTables(): Promise<string[]>
  listIndices(table: string): Promise<string[]>
  journalMode(): Promise<string>
}

export type SqliteReminderStore = ReminderStore & SqliteExtras

// ============================================================================
// Schema DDL
// ============================================================================

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS reminders (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id TEXT NOT NULL,
    guild_id TEXT,
    channel_id TEXT NOT NULL,
    content TEXT NOT NULL,
    remind_at TEXT NOT NULL,
    repeat_type TEXT,
    repeat_value TEXT,
    created_at TEXT NOT NULL,
    is_active INTEGER NOT NULL DEFAULT 1
  );
  CREATE INDEX IF NOT EXISTS idx_remind_at ON reminders(remind_at);
  CREATE INDEX IF NOT EXISTS idx_user_id ON reminders(user_id);
  CREATE INDEX IF NOT EXISTS idx_active_remind_at ON reminders(is_active, remind_at);

  CREATE TABLE IF NOT EXISTS bot_state (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
  );
`

// ============================================================================
// SQL Row Types
// ============================================================================

type ReminderRow = {
  id: number
  user_id: string
  guild_id: string | null
  channel_id: string
  content: string
  remind_at: string
  repeat_type: string | null
  repeat_value: string | null
  created_at: string
  is_active: number
}

type StateRow = {
  value: string
}

type NameRow = {
  name: string
}

// ============================================================================
// Row → Domain Mappers
// ============================================================================

const DATETIME_RE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}$/

function toDateTime(value: string, column: string): LocalDateTime {
  if (!DATETIME_RE.test(value)) {
    throw new InvalidDataError(`Column '${column}' holds a malformed datetime: '${value}'`)
  }
  return value as LocalDateTime
}

function toReminder(row: ReminderRow): Reminder {
  return {
    id: row.id,
    userId: row.user_id,
    guildId: row.guild_id,
    channelId: row.channel_id,
    content: row.content,
    remindAt: toDateTime(row.remind_at, 'remind_at'),
    rule: decodeRule(row.repeat_type, row.repeat_value),
    createdAt: toDateTime(row.created_at, 'created_at'),
    isActive: row.is_active === 1,
  }
}

// ============================================================================
// Factory
// ============================================================================

export async function createSqliteStore(path: string): Promise<SqliteReminderStore> {
  const db = new Database(path)
  db.pragma('journal_mode = WAL')
  db.exec(SCHEMA_SQL)

  const stmt = {
    insert: db.prepare(
      `INSERT INTO reminders
         (user_id, guild_id, channel_id, content, remind_at, repeat_type, repeat_value, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
    ),
    byId: db.prepare('SELECT * FROM reminders WHERE id = ?'),
    due: db.prepare('SELECT * FROM reminders WHERE is_active = 1 AND remind_at <= ? ORDER BY remind_at, id'),
    byUser: db.prepare('SELECT * FROM reminders WHERE user_id = ? ORDER BY remind_at, id'),
    activeByUser: db.prepare('SELECT * FROM reminders WHERE user_id = ? AND is_active = 1 ORDER BY remind_at, id'),
    allActive: db.prepare('SELECT * FROM reminders WHERE is_active = 1 ORDER BY remind_at, id'),
    deactivate: db.prepare('UPDATE reminders SET is_active = 0 WHERE id = ?'),
    delete: db.prepare('DELETE FROM reminders WHERE id = ? AND user_id = ?'),
    setTime: db.prepare('UPDATE reminders SET remind_at = ? WHERE id = ?'),
    setTimeByUser: db.prepare('UPDATE reminders SET remind_at = ? WHERE id = ? AND user_id = ?'),
    setContent: db.prepare('UPDATE reminders SET content = ? WHERE id = ? AND user_id = ?'),
    snooze: db.prepare('UPDATE reminders SET remind_at = ?, is_active = 1 WHERE id = ?'),
    getState: db.prepare('SELECT value FROM bot_state WHERE key = ?'),
    setState: db.prepare('INSERT OR REPLACE INTO bot_state (key, value) VALUES (?, ?)'),
  }

  const store: SqliteReminderStore = {
    // ================================================================
    // Reminders
    // ================================================================
    async createReminder(reminder: NewReminder) {
      const { kind, value } = encodeRule(reminder.rule)
      const info = stmt.insert.run(
        reminder.userId,
        reminder.guildId,
        reminder.channelId,
        reminder.content,
        reminder.remindAt,
        kind,
        value,
        reminder.createdAt,
      )
      return Number(info.lastInsertRowid)
    },

    async getReminder(id: number) {
      const row = stmt.byId.get(id) as ReminderRow | undefined
      return row ? toReminder(row) : null
    },

    async getDueReminders(now: LocalDateTime) {
      const rows = stmt.due.all(now) as ReminderRow[]
      return rows.map(toReminder)
    },

    async getUserReminders(userId: string, query) {
      const rows = (query?.includeInactive ? stmt.byUser : stmt.activeByUser).all(userId) as ReminderRow[]
      return rows.map(toReminder)
    },

    async getAllActiveReminders() {
      const rows = stmt.allActive.all() as ReminderRow[]
      return rows.map(toReminder)
    },

    async deactivateReminder(id: number) {
      return stmt.deactivate.run(id).changes > 0
    },

    async deleteReminder(id: number, userId: string) {
      return stmt.delete.run(id, userId).changes > 0
    },

    async updateReminderTime(id: number, remindAt: LocalDateTime) {
      return stmt.setTime.run(remindAt, id).changes > 0
    },

    async updateReminderTimeByUser(id: number, userId: string, remindAt: LocalDateTime) {
      return stmt.setTimeByUser.run(remindAt, id, userId).changes > 0
    },

    async updateReminderContent(id: number, userId: string, content: string) {
      return stmt.setContent.run(content, id, userId).changes > 0
    },

    async snoozeReminder(id: number, remindAt: LocalDateTime) {
      return stmt.snooze.run(remindAt, id).changes > 0
    },

    // ================================================================
    // Bot State
    // ================================================================
    async getState(key: string) {
      const row = stmt.getState.get(key) as StateRow | undefined
      return row ? row.value : null
    },

    async setState(key: string, value: string) {
      stmt.setState.run(key, value)
    },

    // ================================================================
    // Introspection
    // ================================================================
    async listTables() {
      const rows = db
        .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
        .all() as NameRow[]
      return rows.map((r) => r.name)
    },

    async listIndices(table: string) {
      const rows = db
        .prepare("SELECT name FROM sqlite_master WHERE type = 'index' AND tbl_name = ? AND name NOT LIKE 'sqlite_%' ORDER BY name")
        .all(table) as NameRow[]
      return rows.map((r) => r.name)
    },

    async journalMode() {
      const mode = db.pragma('journal_mode', { simple: true })
      return String(mode)
    },

    async close() {
      db.close()
    },
  }

  return store
}
