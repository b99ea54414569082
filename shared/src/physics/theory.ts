// floor(π·√m): the count the simulation should reproduce for m = 100^k.
export function theoreticalCollisionCount(massLarge: number): number {
  return Math.floor(Math.PI * Math.sqrt(massLarge));
}
