import { format, isValid, parse } from "date-fns";

import { type Result, err, ok } from "~shared/utils/Result";

/** strftime 指令 → date-fns token */
const strftimeTokens: ReadonlyMap<string, string> = new Map([
  ["Y", "yyyy"],
  ["y", "yy"],
  ["m", "MM"],
  ["d", "dd"],
  ["H", "HH"],
  ["I", "hh"],
  ["M", "mm"],
  ["S", "ss"],
  ["p", "a"],
  ["b", "MMM"],
  ["B", "MMMM"],
  ["a", "EEE"],
  ["A", "EEEE"],
  ["j", "DDD"],
  ["f", "SSSSSS"],
]);

const dateFnsOptions = { useAdditionalDayOfYearTokens: true };

/** 格式中沒有的欄位以此補上；兩位數年份會落在 1950–2049 */
const referenceDate = new Date(2000, 0, 1, 0, 0, 0, 0);

export type FilenamePattern = {
  /** 使用者給的 strftime 格式，如 `IMG_%Y%m%d_%H%M%S` */
  source: string;
  /** 轉換後的 date-fns 格式，如 `'IMG_'yyyyMMdd'_'HHmmss` */
  format: string;
};

export type FilenamePatternError = {
  type: "INVALID_PATTERN";
  pattern: string;
  message: string;
};

function quote(literal: string) {
  return `'${literal.replace(/'/g, "''")}'`;
}

export function compileFilenamePattern(
  source: string
): Result<FilenamePattern, FilenamePatternError> {
  let compiled = "";
  let literal = "";

  for (let i = 0; i < source.length; i++) {
    const ch = source[i];
    if (ch !== "%") {
      literal += ch;
      continue;
    }

    if (i + 1 >= source.length) {
      return err({
        type: "INVALID_PATTERN",
        pattern: source,
        message: "格式結尾有多餘的 %",
      });
    }
    const directive = source[++i];
    if (directive === "%") {
      literal += "%";
      continue;
    }

    const token = strftimeTokens.get(directive);
    if (!token) {
      return err({
        type: "INVALID_PATTERN",
        pattern: source,
        message: `不支援的格式指令 %${directive}`,
      });
    }
    if (literal) compiled += quote(literal);
    literal = "";
    compiled += token;
  }
  if (literal) compiled += quote(literal);

  return ok({ source, format: compiled });
}

/**
 * 以 pattern 解析檔名（不含副檔名）。
 * 檔名先截成 pattern 以今天日期輸出時的長度，多出的尾巴（如 `_HDR`）不影響比對。
 */
export function parseFilenameDate(
  stem: string,
  pattern: FilenamePattern,
  today = new Date()
): Date | undefined {
  const length = format(today, pattern.format, dateFnsOptions).length;
  const candidate = stem.slice(0, length);
  const parsed = parse(candidate, pattern.format, referenceDate, dateFnsOptions);
  return isValid(parsed) ? parsed : undefined;
}
