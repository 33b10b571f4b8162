import type { IFrameStore } from "@domain/ports/IFrameStore";
import { assertOperable } from "@domain/services/assertOperable";

export class GetQueueDepth {
  constructor(private store: IFrameStore) {}

  async execute(destination: string) {
    assertOperable(this.store, destination);
    return this.store.depth(destination);
  }
}
