export interface IOperationOptions {
  signal?: AbortSignal;
}
