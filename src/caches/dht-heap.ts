// entry in the admission heap, kept by the owner so it can be removed later
export interface HeapNode<T> {
  readonly value: T;
  readonly cost: number; // lower cost = closer to the top
  readonly sequence: number; // insertion order, breaks ties between equal costs
  index: number; // position in the heap array, -1 once removed
}

// binary min-heap with removable nodes
// used to cap the number of concurrent DHT lookups, ordered by start time
export class DhtLookupHeap<T> {
  private nodes: HeapNode<T>[] = [];
  private sequence = 0;

  insert(value: T, cost: number): HeapNode<T> {
    const node: HeapNode<T> = { value, cost, sequence: this.sequence++, index: this.nodes.length };
    this.nodes.push(node);
    this.siftUp(node.index);
    return node;
  }

  // the node with the lowest cost, i.e. the oldest lookup
  peek(): T | null {
    return this.nodes[0]?.value ?? null;
  }

  // remove a node, removing it twice is a no-op
  remove(node: HeapNode<T>): void {
    const index = node.index;
    if (index < 0 || this.nodes[index] !== node) return;
    node.index = -1;

    const last = this.nodes.pop();
    if (!last || last === node) return;

    // move the last node into the hole and restore heap order
    this.nodes[index] = last;
    last.index = index;
    this.siftDown(index);
    this.siftUp(last.index);
  }

  contains(node: HeapNode<T>): boolean {
    return node.index >= 0 && this.nodes[node.index] === node;
  }

  clear(): void {
    for (const node of this.nodes) node.index = -1;
    this.nodes = [];
  }

  size(): number {
    return this.nodes.length;
  }

  private less(a: HeapNode<T>, b: HeapNode<T>): boolean {
    return a.cost < b.cost || (a.cost === b.cost && a.sequence < b.sequence);
  }

  private swap(i: number, j: number): void {
    const a = this.nodes[i];
    const b = this.nodes[j];
    this.nodes[i] = b;
    this.nodes[j] = a;
    a.index = j;
    b.index = i;
  }

  private siftUp(index: number): void {
    while (index > 0) {
      const parent = (index - 1) >> 1;
      if (!this.less(this.nodes[index], this.nodes[parent])) return;
      this.swap(index, parent);
      index = parent;
    }
  }

  private siftDown(index: number): void {
    for (;;) {
      const left = 2 * index + 1;
      const right = left + 1;
      let smallest = index;
      if (left < this.nodes.length && this.less(this.nodes[left], this.nodes[smallest])) {
        smallest = left;
      }
      if (right < this.nodes.length && this.less(this.nodes[right], this.nodes[smallest])) {
        smallest = right;
      }
      if (smallest === index) return;
      this.swap(index, smallest);
      index = smallest;
    }
  }
}
