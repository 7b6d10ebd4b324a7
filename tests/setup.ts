declare global {
  var defaultTimeout: number;
}

globalThis.defaultTimeout = 10000;

export {};
