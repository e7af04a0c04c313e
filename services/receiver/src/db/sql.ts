// Tables are append-only; redelivered ticks may appear twice.
export const CREATE_SCHEMA = `
  CREATE TABLE IF NOT EXISTS ticks (
    id               BIGSERIAL PRIMARY KEY,
    instrument_token BIGINT           NOT NULL,
    trading_symbol   TEXT             NOT NULL,
    underlying       TEXT,
    mode             TEXT             NOT NULL,
    exchange_ts      TIMESTAMPTZ      NOT NULL,
    trade_date       DATE             NOT NULL,
    last_price       DOUBLE PRECISION NOT NULL,
    last_quantity    BIGINT,
    average_price    DOUBLE PRECISION,
    volume           BIGINT,
    buy_quantity     BIGINT,
    sell_quantity    BIGINT,
    open             DOUBLE PRECISION,
    high             DOUBLE PRECISION,
    low              DOUBLE PRECISION,
    close            DOUBLE PRECISION,
    change_pct       DOUBLE PRECISION,
    last_trade_ts    TIMESTAMPTZ,
    oi               BIGINT,
    oi_day_high      BIGINT,
    oi_day_low       BIGINT,
    stream_id        TEXT,
    received_at      TIMESTAMPTZ      NOT NULL DEFAULT now()
  );
  CREATE INDEX IF NOT EXISTS ticks_token_ts_idx ON ticks (instrument_token, exchange_ts);
  CREATE INDEX IF NOT EXISTS ticks_symbol_date_idx ON ticks (trading_symbol, trade_date);

  CREATE TABLE IF NOT EXISTS tick_depths (
    id               BIGSERIAL PRIMARY KEY,
    tick_id          BIGINT           NOT NULL REFERENCES ticks (id) ON DELETE CASCADE,
    instrument_token BIGINT           NOT NULL,
    exchange_ts      TIMESTAMPTZ      NOT NULL,
    side             TEXT             NOT NULL CHECK (side IN ('buy', 'sell')),
    level            SMALLINT         NOT NULL,
    price            DOUBLE PRECISION NOT NULL,
    quantity         BIGINT           NOT NULL,
    orders           INTEGER          NOT NULL
  );
  CREATE INDEX IF NOT EXISTS tick_depths_tick_idx ON tick_depths (tick_id);
  CREATE INDEX IF NOT EXISTS tick_depths_token_ts_idx ON tick_depths (instrument_token, exchange_ts);
`;

// Ids are taken up front so depth rows can point at their tick inside the same transaction.
export const ALLOCATE_TICK_IDS = `
  SELECT nextval(pg_get_serial_sequence('ticks', 'id'))::text AS id
  FROM generate_series(1, $1::integer)
`;

export const INSERT_TICKS_BATCH = `
  INSERT INTO ticks (
    id, instrument_token, trading_symbol, underlying, mode, exchange_ts, trade_date,
    last_price, last_quantity, average_price, volume, buy_quantity, sell_quantity,
    open, high, low, close, change_pct, last_trade_ts, oi, oi_day_high, oi_day_low,
    stream_id, received_at
  )
  SELECT * FROM unnest(
    $1::bigint[], $2::bigint[], $3::text[], $4::text[], $5::text[],
    $6::timestamptz[], $7::date[], $8::double precision[], $9::bigint[],
    $10::double precision[], $11::bigint[], $12::bigint[], $13::bigint[],
    $14::double precision[], $15::double precision[], $16::double precision[],
    $17::double precision[], $18::double precision[], $19::timestamptz[],
    $20::bigint[], $21::bigint[], $22::bigint[], $23::text[], $24::timestamptz[]
  )
`;

export const INSERT_DEPTHS_BATCH = `
  INSERT INTO tick_depths (tick_id, instrument_token, exchange_ts, side, level, price, quantity, orders)
  SELECT * FROM unnest(
    $1::bigint[], $2::bigint[], $3::timestamptz[], $4::text[],
    $5::smallint[], $6::double precision[], $7::bigint[], $8::integer[]
  )
`;
