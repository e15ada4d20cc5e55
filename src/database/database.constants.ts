/** Largest value of a Postgres `integer` (SERIAL) primary key. */
export const MAX_ID = 2147483647;
