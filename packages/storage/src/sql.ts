import type Database from 'better-sqlite3'
import type postgres from 'postgres'

export type SqlParam = string | number | null

export type SqlRow = Record<string, unknown>

/**
 * The slice of a SQL driver the relational backends use. Queries are written
 * once with `$1`-style placeholders and portable SQL (TEXT, BIGINT,
 * `ON CONFLICT ... DO UPDATE`), so the same backend runs on Postgres in
 * production and on an in-memory SQLite database in tests.
 */
export interface SqlClient {
    query(text: string, params?: readonly SqlParam[]): Promise<SqlRow[]>
}

function isRow(value: unknown): value is SqlRow {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Wrap a postgres.js connection pool.
 *
 * @example
 * ```ts
 * import postgres from 'postgres'
 * const client = postgresClient(postgres(process.env.DATABASE_URL ?? '', { max: 10 }))
 * ```
 */
export function postgresClient(sql: postgres.Sql): SqlClient {
    return {
        async query(text, params = []) {
            const rows = await sql.unsafe(text, [...params])
            return rows.map((row): SqlRow => ({ ...row }))
        },
    }
}

/**
 * Rewrite `$n` placeholders to `?` and order the parameters by occurrence,
 * so one parameter may appear several times in the text.
 */
export function toPositional(text: string, params: readonly SqlParam[]): { text: string; params: SqlParam[] } {
    const ordered: SqlParam[] = []
    const rewritten = text.replace(/\$(\d+)/g, (_match, index: string) => {
        ordered.push(params[Number(index) - 1] ?? null)
        return '?'
    })
    return { text: rewritten, params: ordered }
}

/**
 * Wrap a better-sqlite3 database. Calls are synchronous underneath; the
 * promise interface only matches the other drivers.
 */
export function sqliteClient(db: Database.Database): SqlClient {
    return {
        async query(text, params = []) {
            const positional = toPositional(text, params)
            const stmt = db.prepare(positional.text)
            if (!stmt.reader) {
                stmt.run(...positional.params)
                return []
            }
            return stmt.all(...positional.params).filter(isRow)
        },
    }
}
