export const INITIAL_BUCKET_COUNT = 16;
export const MAX_LOAD_FACTOR = 0.75;

/** Initial arena capacity in slots, sentinels included. */
export const INITIAL_SLOT_CAPACITY = 16;

// Sentinel slots. Never hold data, never enter the hash index.
export const HEAD = 0;
export const TAIL = 1;

/** End of a chain / no slot. */
export const NIL = -1;
