export interface IMessageIdGenerator {
  next(): string;
}
