// 与 .5 相差在此范围内视为恰好居中
const TIE_EPSILON = 1e-9

/**
 * 保留 `digits` 位小数，居中时取偶数（银行家舍入）
 *
 * 所有分数都经过这里舍入
 */
export function roundScore(value: number, digits = 2): number {
  const factor = 10 ** digits
  const scaled = value * factor
  const floor = Math.floor(scaled)
  const fraction = scaled - floor

  let rounded: number
  if (Math.abs(fraction - 0.5) < TIE_EPSILON) {
    rounded = floor % 2 === 0 ? floor : floor + 1
  } else {
    rounded = Math.round(scaled)
  }

  return rounded / factor
}
