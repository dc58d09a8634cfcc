/** Milliseconds. Fractional values are allowed for elapsed-time measurements. */
export type Milliseconds = number

export type Seconds = number
