export function ema(values: number[], length: number): number[] {
  const series = new Array<number>(values.length).fill(NaN);
  if (length <= 0 || values.length < length) {
    return series;
  }

  const multiplier = 2 / (length + 1);
  let emaValue = average(values.slice(0, length));
  series[length - 1] = emaValue;

  for (let i = length; i < values.length; i += 1) {
    emaValue = (values[i] - emaValue) * multiplier + emaValue;
    series[i] = emaValue;
  }

  return series;
}

/** EMA over the finite tail of a series that starts with NaN warm-up samples. */
export function emaOfDefined(values: number[], length: number): number[] {
  const firstValid = values.findIndex((value) => Number.isFinite(value));
  const series = new Array<number>(values.length).fill(NaN);
  if (firstValid === -1) {
    return series;
  }
  const tail = ema(values.slice(firstValid), length);
  for (let i = 0; i < tail.length; i += 1) {
    series[firstValid + i] = tail[i];
  }
  return series;
}

const average = (nums: number[]): number => {
  const sum = nums.reduce((acc, value) => acc + value, 0);
  return sum / nums.length;
};
