export class TypedEventEmitter<T extends { [K in keyof T]: unknown }> {
  private handlers: { [K in keyof T]?: Array<(payload: T[K]) => void> } = {};

  on<K extends keyof T>(event: K, cb: (payload: T[K]) => void): () => void {
    const list = (this.handlers[event] ||= []);
    list.push(cb);
    return () => {
      const idx = list.indexOf(cb);
      if (idx >= 0) list.splice(idx, 1);
    };
  }

  emit<K extends keyof T>(event: K, payload: T[K]) {
    for (const h of [...(this.handlers[event] || [])]) h(payload);
  }
}
