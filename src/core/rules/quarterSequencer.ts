export type QuarterKey = readonly [year: number, quarter: number, day: number];

const QUARTER_TOKEN = /(\d{4})Q([1-4])/;
const DATE_TOKEN = /(\d{8})/;

export const FALLBACK_QUARTER_KEY: QuarterKey = [9999, 9, 99];

const fileNameOf = (path: string): string => path.split("/").at(-1) ?? path;

/**
 * `2024Q1` -> (2024, 1, 0); `20240615` -> (2024, 2, 15); anything else sorts last.
 */
export const quarterKey = (path: string): QuarterKey => {
  const fileName = fileNameOf(path);

  const quarter = QUARTER_TOKEN.exec(fileName);
  if (quarter?.[1] && quarter[2]) {
    return [Number(quarter[1]), Number(quarter[2]), 0];
  }

  const date = DATE_TOKEN.exec(fileName)?.[1];
  if (date) {
    const month = Number(date.slice(4, 6));
    return [
      Number(date.slice(0, 4)),
      Math.floor((month - 1) / 3) + 1,
      Number(date.slice(6, 8)),
    ];
  }

  return FALLBACK_QUARTER_KEY;
};

/**
 * Heading used in time-series prompts, e.g. "2024年Q1" or "2024年06月".
 */
export const quarterLabel = (path: string): string => {
  const fileName = fileNameOf(path);

  const quarter = QUARTER_TOKEN.exec(fileName);
  if (quarter?.[1] && quarter[2]) {
    return `${quarter[1]}年Q${quarter[2]}`;
  }

  const date = DATE_TOKEN.exec(fileName)?.[1];
  if (date) {
    return `${date.slice(0, 4)}年${date.slice(4, 6)}月`;
  }

  return "不明";
};

const compareKeys = (left: QuarterKey, right: QuarterKey): number =>
  left[0] - right[0] || left[1] - right[1] || left[2] - right[2];

/**
 * Stable oldest-to-newest ordering; the last element is the latest document.
 */
export const sortByQuarter = (paths: readonly string[]): string[] =>
  paths
    .map((path, index) => ({ path, index, key: quarterKey(path) }))
    .sort(
      (left, right) =>
        compareKeys(left.key, right.key) || left.index - right.index,
    )
    .map((entry) => entry.path);
