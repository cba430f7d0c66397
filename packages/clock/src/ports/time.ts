/** Duration or epoch instant expressed in milliseconds. */
export type Milliseconds = number
