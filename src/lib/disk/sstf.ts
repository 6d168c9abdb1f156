// Nearest pending track first; equal distances go to the lower track.
export function sstfOrder(requests: number[], head: number): number[] {
  const pending = [...requests];
  const order: number[] = [];
  let current = head;

  while (pending.length > 0) {
    let pick = 0;
    for (let index = 1; index < pending.length; index += 1) {
      const distance = Math.abs(pending[index] - current);
      const best = Math.abs(pending[pick] - current);
      if (distance < best || (distance === best && pending[index] < pending[pick])) {
        pick = index;
      }
    }
    const [track] = pending.splice(pick, 1);
    order.push(track);
    current = track;
  }

  return order;
}
