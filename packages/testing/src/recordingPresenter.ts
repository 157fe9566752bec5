import type { ComponentKind, ComponentPayload } from '@stream-overlay/protocol';

export type PresenterCall =
  | { readonly op: 'show'; readonly kind: ComponentKind; readonly payload: ComponentPayload }
  | { readonly op: 'hide'; readonly kind: ComponentKind }
  | { readonly op: 'update'; readonly kind: ComponentKind; readonly payload: ComponentPayload };

/**
 * Presenter double that records every call in order.
 */
export interface RecordingPresenter {
  show(kind: ComponentKind, payload: ComponentPayload): void;
  hide(kind: ComponentKind): void;
  update(kind: ComponentKind, payload: ComponentPayload): void;
  readonly calls: PresenterCall[];
  clear(): void;
}

export function createRecordingPresenter(): RecordingPresenter {
  const calls: PresenterCall[] = [];

  return {
    show: (kind, payload) => {
      calls.push({ op: 'show', kind, payload });
    },
    hide: (kind) => {
      calls.push({ op: 'hide', kind });
    },
    update: (kind, payload) => {
      calls.push({ op: 'update', kind, payload });
    },
    get calls() {
      return calls;
    },
    clear: () => {
      calls.length = 0;
    },
  };
}
