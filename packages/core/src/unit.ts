const UnitBrand: unique symbol = Symbol("Unit");

export interface Unit {
  readonly [UnitBrand]: true;
}

// 沒有任何資訊的 token：task 裡 `yield unit` 代表把控制權交回 executor 一輪
export const unit: Unit = Object.freeze({ [UnitBrand]: true as const });

export function isUnit(value: unknown): value is Unit {
  return value === unit;
}
