export const STORAGE_SCHEMA = `
CREATE TABLE IF NOT EXISTS block_headers (
    number INTEGER PRIMARY KEY,
    hash TEXT NOT NULL UNIQUE,
    parent_hash TEXT NOT NULL,
    state_root TEXT NOT NULL,
    timestamp INTEGER NOT NULL,
    sequencer_address TEXT NOT NULL,
    gas_price TEXT NOT NULL,
    version TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS transactions (
    hash TEXT PRIMARY KEY,
    block_number INTEGER NOT NULL REFERENCES block_headers(number) ON DELETE CASCADE,
    idx INTEGER NOT NULL,
    body TEXT NOT NULL,
    execution_status TEXT NOT NULL,
    UNIQUE (block_number, idx)
);

CREATE TABLE IF NOT EXISTS l1_state (
    id INTEGER PRIMARY KEY CHECK (id = 1),
    block_number INTEGER
);
`;
