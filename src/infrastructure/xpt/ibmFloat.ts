import { ValidationError } from '../../domain/errors/DocumentErrors.js';

const TWO_POW_32 = 2 ** 32;
const TWO_POW_56 = 2 ** 56;

/**
 * 将 IBM 370 十六进制浮点数（大端，1-8 字节）转换为 IEEE 双精度
 * 不足 8 字节时低位补零
 *
 * @param bytes - IBM 浮点字节
 * @returns 数值
 */
export function ibmToIeee(bytes: Uint8Array): number {
  const padded = new Uint8Array(8);
  padded.set(bytes.subarray(0, 8));

  const sign = padded[0] & 0x80 ? -1 : 1;
  const exponent = (padded[0] & 0x7f) - 64;
  const hi = (padded[1] << 16) | (padded[2] << 8) | padded[3];
  const lo =
    ((padded[4] << 24) >>> 0) + (padded[5] << 16) + (padded[6] << 8) + padded[7];

  if (hi === 0 && lo === 0) {
    return 0;
  }

  // 尾数为 56 位小数：value = 0.mantissa × 16^exponent
  const value =
    hi * 2 ** (4 * exponent - 24) + lo * 2 ** (4 * exponent - 56);
  return sign * value;
}

/**
 * 将 IEEE 双精度转换为 IBM 370 十六进制浮点数，并截断到指定长度
 *
 * @param value - 数值
 * @param length - 字节长度（2-8）
 * @returns IBM 浮点字节
 * @throws {ValidationError} 数值无法用 IBM 浮点表示时抛出
 */
export function ieeeToIbm(value: number, length = 8): Uint8Array {
  const out = new Uint8Array(8);
  if (!Number.isFinite(value)) {
    throw new ValidationError(`Numeric value ${value} cannot be stored`);
  }
  if (value === 0) {
    return out.subarray(0, length);
  }

  const sign = value < 0 ? 0x80 : 0;
  const magnitude = Math.abs(value);

  let exponent = Math.floor(Math.log2(magnitude) / 4) + 1;
  let fraction = magnitude / 16 ** exponent;
  while (fraction >= 1) {
    exponent += 1;
    fraction = magnitude / 16 ** exponent;
  }
  while (fraction < 1 / 16) {
    exponent -= 1;
    fraction = magnitude / 16 ** exponent;
  }

  if (exponent + 64 > 127) {
    throw new ValidationError(`Numeric value ${value} is out of range`);
  }
  if (exponent + 64 < 0) {
    return out.subarray(0, length);
  }

  const mantissa = fraction * TWO_POW_56;
  const hi = Math.floor(mantissa / TWO_POW_32);
  const lo = mantissa - hi * TWO_POW_32;

  out[0] = sign | (exponent + 64);
  out[1] = (hi >>> 16) & 0xff;
  out[2] = (hi >>> 8) & 0xff;
  out[3] = hi & 0xff;
  out[4] = Math.floor(lo / 2 ** 24) & 0xff;
  out[5] = Math.floor(lo / 2 ** 16) & 0xff;
  out[6] = Math.floor(lo / 2 ** 8) & 0xff;
  out[7] = lo & 0xff;
  return out.subarray(0, length);
}
