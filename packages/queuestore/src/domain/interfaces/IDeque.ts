export interface IDeque<T> {
  pushBack(value: T): void;
  pushFront(value: T): void;
  shift(): T | undefined;
  size(): number;
  isEmpty(): boolean;
  clear(): void;
}
