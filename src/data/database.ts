import Database from 'better-sqlite3'

class AppDatabase {
  db: Database.Database

  /**
   * @param dbPath file path, or `:memory:` for a throwaway database
   */
  constructor(dbPath: string) {
    this.db = new Database(dbPath)
    if (dbPath !== ':memory:') this.db.pragma('journal_mode = WAL')
    this.migrate()
  }

  migrate() {
    this.db.exec('CREATE TABLE IF NOT EXISTS schema_version (version INTEGER PRIMARY KEY)')
    const row = this.db.prepare<[], { v: number | null }>('SELECT MAX(version) as v FROM schema_version').get()
    const currentVersion = row?.v || 0
    const migrations = [this._v1.bind(this), this._v2.bind(this)]
    for (let i = currentVersion; i < migrations.length; i++) {
      migrations[i]()
      this.db.prepare('INSERT INTO schema_version (version) VALUES (?)').run(i + 1)
    }
  }

  _v1() {
    this.db.exec(`
      CREATE TABLE timesheet_rows (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id TEXT NOT NULL,
        date TEXT NOT NULL,
        weekday TEXT NOT NULL,
        check_in TEXT NOT NULL,
        check_out TEXT NOT NULL,
        total_hours TEXT NOT NULL,
        activity TEXT NOT NULL DEFAULT ''
      );
      CREATE INDEX idx_timesheet_user ON timesheet_rows(user_id);
    `)
  }

  _v2() {
    this.db.exec(`
      CREATE TABLE open_sessions (
        user_id TEXT PRIMARY KEY,
        check_in_at INTEGER NOT NULL
      );
    `)
  }

  close() {
    this.db.close()
  }
}

export { AppDatabase }
