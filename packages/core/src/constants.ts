/** Virtual node the graph enters through; never executed. */
export const START = "__start__";

/** Terminal marker: a router returning it halts the turn. */
export const END = "__end__";
