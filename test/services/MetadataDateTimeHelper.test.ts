import { describe, expect, test } from "vitest";

import {
  formatContainerDateTime,
  parseContainerDateTime,
} from "@/services/MetadataContainer";

describe("parseContainerDateTime", () => {
  test("YYYY:MM:DD HH:mm:ss 以本地時間解析", () => {
    expect(parseContainerDateTime("2019:05:04 10:20:30")).toEqual({
      value: new Date(2019, 4, 4, 10, 20, 30),
      zone: "local",
    });
  });

  test("整數視為毫秒 epoch", () => {
    expect(parseContainerDateTime(" 1672574400000 ")).toEqual({
      value: new Date(1672574400000),
      zone: "local",
    });
  });

  test("無法解析回傳 undefined", () => {
    expect(parseContainerDateTime(undefined)).toBeUndefined();
    expect(parseContainerDateTime("not a date")).toBeUndefined();
    expect(parseContainerDateTime("2019:13:04 10:20:30")).toBeUndefined();
    expect(parseContainerDateTime("0000:00:00 00:00:00")).toBeUndefined();
  });
});

describe("formatContainerDateTime", () => {
  test("本地時間", () => {
    expect(
      formatContainerDateTime({
        value: new Date(2023, 0, 1, 12, 0, 0),
        zone: "local",
      })
    ).toBe("2023:01:01 12:00:00");
  });

  test("UTC 時間", () => {
    expect(
      formatContainerDateTime({
        value: new Date(1000000000 * 1000),
        zone: "utc",
      })
    ).toBe("2001:09:09 01:46:40");
  });
});
