/** Returns a value in [0, 1). */
export type RandomSource = () => number;

export const mathRandom: RandomSource = () => Math.random();

export const fixedRandom = (value: number): RandomSource => () => value;

/**
 * Replays `values` in order, then repeats the last one.
 */
export const scriptedRandom = (values: number[]): RandomSource => {
  if (!values.length) {
    throw new Error('scriptedRandom needs at least one value');
  }

  let index = 0;
  return () => {
    const value = values[Math.min(index, values.length - 1)];
    index += 1;
    return value;
  };
};
