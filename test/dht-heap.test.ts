import { DhtLookupHeap } from '../src/caches/dht-heap';

describe('DhtLookupHeap', () => {
  test('should keep the lowest cost on top', () => {
    const heap = new DhtLookupHeap<string>();
    heap.insert('late', 30);
    heap.insert('early', 10);
    heap.insert('middle', 20);

    expect(heap.size()).toBe(3);
    expect(heap.peek()).toBe('early');
  });

  test('should order equal costs by insertion', () => {
    const heap = new DhtLookupHeap<string>();
    heap.insert('first', 5);
    heap.insert('second', 5);

    expect(heap.peek()).toBe('first');
  });

  test('should remove any node and restore order', () => {
    const heap = new DhtLookupHeap<string>();
    const nodes = [50, 10, 40, 20, 30].map(cost => heap.insert(`n${cost}`, cost));

    heap.remove(nodes[1]);
    expect(heap.peek()).toBe('n20');
    expect(heap.contains(nodes[1])).toBe(false);

    heap.remove(nodes[2]);
    const order: string[] = [];
    while (heap.size() > 0) {
      const top = heap.peek();
      const node = nodes.find(n => n.value === top);
      if (!node) break;
      order.push(node.value);
      heap.remove(node);
    }
    expect(order).toEqual(['n20', 'n30', 'n50']);
  });

  test('should ignore a second removal', () => {
    const heap = new DhtLookupHeap<string>();
    const a = heap.insert('a', 1);
    heap.insert('b', 2);

    heap.remove(a);
    heap.remove(a);

    expect(heap.size()).toBe(1);
    expect(heap.peek()).toBe('b');
  });

  test('should forget every node on clear', () => {
    const heap = new DhtLookupHeap<string>();
    const a = heap.insert('a', 1);
    heap.clear();

    expect(heap.size()).toBe(0);
    expect(heap.peek()).toBeNull();
    expect(heap.contains(a)).toBe(false);
  });
});
