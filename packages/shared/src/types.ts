export type XY = [x: number, y: number]
