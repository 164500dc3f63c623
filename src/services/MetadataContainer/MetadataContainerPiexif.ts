import * as piexif from "piexif-ts";

import { type Result, err, ok } from "~shared/utils/Result";

import type { DMSCoordinates, DegMinSec } from "@/utils/coordinates";

import type {
  ContainerOpenError,
  ContainerWriteError,
  MetadataCodec,
  MetadataContainer,
} from "./MetadataContainer";

type ExifDict = ReturnType<typeof piexif.load>;
type Rational = [number, number];

const { ImageIFD, GPSIFD } = piexif.TagValues;

const EXIF_HEADER = "Exif\0\0";
const RATIONAL_DENOMINATOR = 10000;

function isJpeg(bytes: Buffer) {
  return bytes.length >= 4 && bytes[0] === 0xff && bytes[1] === 0xd8;
}

/**
 * 走訪 JPEG segment，找出 APP1 Exif 區塊。
 * 到 SOS（影像資料開始）或 EOI 就停止。
 */
export function hasExifSegment(bytes: Buffer) {
  let offset = 2;
  while (offset + 4 <= bytes.length) {
    if (bytes[offset] !== 0xff) return false;
    const marker = bytes[offset + 1];
    if (marker === 0xda || marker === 0xd9) return false;
    const length = bytes.readUInt16BE(offset + 2);
    if (
      marker === 0xe1 &&
      bytes.toString("binary", offset + 4, offset + 10) === EXIF_HEADER
    ) {
      return true;
    }
    offset += 2 + length;
  }
  return false;
}

function isRational(value: unknown): value is Rational {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    typeof value[0] === "number" &&
    typeof value[1] === "number" &&
    value[1] !== 0
  );
}

/** GPSLatitude / GPSLongitude 必須是三個 rational：度、分、秒 */
function readDegMinSec(value: unknown): DegMinSec | undefined {
  if (!Array.isArray(value) || value.length !== 3) return undefined;
  const [d, m, s]: unknown[] = value;
  if (!isRational(d) || !isRational(m) || !isRational(s)) return undefined;
  return {
    degrees: d[0] / d[1],
    minutes: m[0] / m[1],
    seconds: s[0] / s[1],
  };
}

function readRef(value: unknown) {
  return typeof value === "string" ? value.trim().toUpperCase() : undefined;
}

function toRational(value: number): Rational {
  if (Number.isInteger(value)) return [value, 1];
  return [Math.round(value * RATIONAL_DENOMINATOR), RATIONAL_DENOMINATOR];
}

function isValidPart({ degrees, minutes, seconds }: DegMinSec) {
  return [degrees, minutes, seconds].every((n) => Number.isFinite(n) && n >= 0);
}

function messageOf(e: unknown) {
  return e instanceof Error ? e.message : String(e);
}

class MetadataContainerPiexif implements MetadataContainer {
  constructor(
    private readonly dict: ExifDict,
    private readonly jpeg: string
  ) {}

  getDateTime(): string | undefined {
    const value: unknown = this.dict["0th"]?.[ImageIFD.DateTime];
    return typeof value === "string" ? value : undefined;
  }

  setDateTime(value: string): void {
    const ifd0 = (this.dict["0th"] ??= {});
    ifd0[ImageIFD.DateTime] = value;
  }

  getLocation(): DMSCoordinates | undefined {
    const gps = this.dict.GPS;
    if (!gps) return undefined;

    const latitude = readDegMinSec(gps[GPSIFD.GPSLatitude]);
    const longitude = readDegMinSec(gps[GPSIFD.GPSLongitude]);
    const latRef = readRef(gps[GPSIFD.GPSLatitudeRef]);
    const lonRef = readRef(gps[GPSIFD.GPSLongitudeRef]);
    if (!latitude || !longitude) return undefined;
    if (latRef !== "N" && latRef !== "S") return undefined;
    if (lonRef !== "E" && lonRef !== "W") return undefined;

    return {
      latitude: { ...latitude, ref: latRef },
      longitude: { ...longitude, ref: lonRef },
    };
  }

  setLocation(location: DMSCoordinates): Result<void, ContainerWriteError> {
    if (!isValidPart(location.latitude) || !isValidPart(location.longitude)) {
      return err({
        type: "INVALID_VALUE",
        message: "GPS 度分秒必須是非負的有限數值",
      });
    }

    const gps = (this.dict.GPS ??= {});
    gps[GPSIFD.GPSVersionID] ??= [2, 2, 0, 0];
    gps[GPSIFD.GPSLatitudeRef] = location.latitude.ref;
    gps[GPSIFD.GPSLatitude] = [
      toRational(location.latitude.degrees),
      toRational(location.latitude.minutes),
      toRational(location.latitude.seconds),
    ];
    gps[GPSIFD.GPSLongitudeRef] = location.longitude.ref;
    gps[GPSIFD.GPSLongitude] = [
      toRational(location.longitude.degrees),
      toRational(location.longitude.minutes),
      toRational(location.longitude.seconds),
    ];
    return ok();
  }

  serialize(): Result<Buffer, ContainerWriteError> {
    try {
      const exif = piexif.dump(this.dict);
      return ok(Buffer.from(piexif.insert(exif, this.jpeg), "binary"));
    } catch (e) {
      return err({ type: "SERIALIZE_FAILED", message: messageOf(e) });
    }
  }
}

/**
 * 以 piexif-ts 處理 JPEG 的 EXIF（APP1）區塊。
 * piexif-ts 以 binary string 操作，進出時與 Buffer 互轉。
 */
export class MetadataCodecPiexif implements MetadataCodec {
  open(bytes: Buffer): Result<MetadataContainer, ContainerOpenError> {
    if (!isJpeg(bytes)) {
      return err({ type: "UNSUPPORTED_FORMAT", message: "不是 JPEG 檔案" });
    }
    if (!hasExifSegment(bytes)) {
      return err({ type: "NO_METADATA_BLOCK", message: "沒有 EXIF 區塊" });
    }

    const jpeg = bytes.toString("binary");
    try {
      return ok(new MetadataContainerPiexif(piexif.load(jpeg), jpeg));
    } catch (e) {
      return err({ type: "PARSE_FAILED", message: messageOf(e) });
    }
  }
}
