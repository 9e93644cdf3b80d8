export type RuntimeEvent = {
  name: string;
  payload?: Record<string, unknown>;
};

/** Runs synchronously inside the call that raised the event; a throw propagates to that call. */
export type RuntimeEventHandler = (event: RuntimeEvent) => void;
