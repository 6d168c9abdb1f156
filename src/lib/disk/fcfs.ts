export function fcfsOrder(requests: number[]): number[] {
  return [...requests];
}
