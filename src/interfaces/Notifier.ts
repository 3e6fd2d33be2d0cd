export interface Notifier {
  /** Deliver a failure summary; resolves even when delivery fails */
  notify(message: string): Promise<void>;
}
