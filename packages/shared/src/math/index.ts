export * from './fixed'
export * from './rng'
export * as Vec2 from './vec2'
