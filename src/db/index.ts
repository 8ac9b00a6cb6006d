import pg from 'pg'
import { createSchema } from './schema.js'

const { Pool } = pg

export function createPool(connectionString: string): pg.Pool {
    const pool = new Pool({ connectionString })

    // Idle-client errors must not take the process down: quota checks fail open
    // and dataset reads never touch the database.
    pool.on('error', (err) => {
        console.error('Unexpected error on idle client', err)
    })

    return pool
}

export async function initDb(pool: pg.Pool) {
    const client = await pool.connect()
    try {
        await createSchema(client)
        console.log('Database schema initialized successfully.')
    } finally {
        client.release()
    }
}
