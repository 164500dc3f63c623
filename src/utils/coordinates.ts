export type DecimalCoordinates = {
  latitude: number;
  longitude: number;
};

export type DegMinSec = {
  degrees: number;
  minutes: number;
  seconds: number;
};

export type DMSLatitude = DegMinSec & { ref: "N" | "S" };
export type DMSLongitude = DegMinSec & { ref: "E" | "W" };

/** EXIF GPS 欄位原生使用的表示法 */
export type DMSCoordinates = {
  latitude: DMSLatitude;
  longitude: DMSLongitude;
};

function toDegrees({ degrees, minutes, seconds }: DegMinSec) {
  return degrees + minutes / 60 + seconds / 3600;
}

function toDegMinSec(value: number): DegMinSec {
  const abs = Math.abs(value);
  const degrees = Math.trunc(abs);
  const minutesWithFraction = (abs - degrees) * 60;
  const minutes = Math.trunc(minutesWithFraction);
  return { degrees, minutes, seconds: (minutesWithFraction - minutes) * 60 };
}

export function toDecimal(coords: DMSCoordinates): DecimalCoordinates {
  const latitude = toDegrees(coords.latitude);
  const longitude = toDegrees(coords.longitude);
  return {
    latitude: coords.latitude.ref === "S" ? -latitude : latitude,
    longitude: coords.longitude.ref === "W" ? -longitude : longitude,
  };
}

/**
 * 十進位度數轉為度分秒。
 * 不檢查範圍，超出 [-90,90] / [-180,180] 的值會原樣換算。
 */
export function toDMS(coords: DecimalCoordinates): DMSCoordinates {
  return {
    latitude: {
      ...toDegMinSec(coords.latitude),
      ref: coords.latitude >= 0 ? "N" : "S",
    },
    longitude: {
      ...toDegMinSec(coords.longitude),
      ref: coords.longitude >= 0 ? "E" : "W",
    },
  };
}

export function formatDecimal(coords: DecimalCoordinates) {
  return `${coords.latitude.toFixed(6)}, ${coords.longitude.toFixed(6)}`;
}
