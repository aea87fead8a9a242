export const name = "not a benchmark";
