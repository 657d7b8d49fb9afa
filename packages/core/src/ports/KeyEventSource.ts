export interface KeyPressEvent {
  key: string;
  ctrlKey: boolean;
  altKey: boolean;
  shiftKey: boolean;
  metaKey: boolean;
  preventDefault(): void;
}

export type KeyPressListener = (event: KeyPressEvent) => void;

export interface KeyEventSource {
  addEventListener(type: 'keydown', listener: KeyPressListener): void;
  removeEventListener(type: 'keydown', listener: KeyPressListener): void;
}
