// Physical keyboard -> hex keypad, using KeyboardEvent.code names.
//   1 2 3 4        1 2 3 C
//   Q W E R   ->   4 5 6 D
//   A S D F        7 8 9 E
//   Z X C V        A 0 B F
export const DEFAULT_KEYMAP: Readonly<Record<string, number>> = {
  Digit1: 0x1, Digit2: 0x2, Digit3: 0x3, Digit4: 0xC,
  KeyQ: 0x4, KeyW: 0x5, KeyE: 0x6, KeyR: 0xD,
  KeyA: 0x7, KeyS: 0x8, KeyD: 0x9, KeyF: 0xE,
  KeyZ: 0xA, KeyX: 0x0, KeyC: 0xB, KeyV: 0xF,
};

export function keyForCode(code: string, keymap: Readonly<Record<string, number>> = DEFAULT_KEYMAP): number | undefined {
  return Object.prototype.hasOwnProperty.call(keymap, code) ? keymap[code] : undefined;
}
