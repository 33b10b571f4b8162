import type { IDeque } from "@domain/interfaces/IDeque";

class LinkedNode<Data> {
  public next?: LinkedNode<Data>;

  constructor(public data: Data) {}
}

export class LinkedListDeque<Data> implements IDeque<Data> {
  private count = 0;
  private head?: LinkedNode<Data>;
  private tail?: LinkedNode<Data>;

  pushBack(data: Data) {
    const node = new LinkedNode(data);
    if (this.tail) {
      this.tail.next = node;
    } else {
      this.head = node;
    }
    this.tail = node;
    this.count++;
  }

  pushFront(data: Data) {
    const node = new LinkedNode(data);
    node.next = this.head;
    this.head = node;
    this.tail ??= node;
    this.count++;
  }

  shift() {
    if (!this.head) return;
    const { data } = this.head;
    this.head = this.head.next;
    if (!this.head) this.tail = undefined;
    this.count--;
    return data;
  }

  isEmpty() {
    return this.count === 0;
  }

  size() {
    return this.count;
  }

  clear() {
    this.head = undefined;
    this.tail = undefined;
    this.count = 0;
  }
}
