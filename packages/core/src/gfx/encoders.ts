// Encoder collaborators. The core only produces RGBA8888 pixels; container
// formats (PNG, GIF, ...) are supplied by the caller.

export interface RGBAImage {
  width: number;
  height: number;
  data: Uint8Array; // width * height * 4, 8 bits per channel
}

export interface StillImageEncoder {
  encodeStill(image: RGBAImage): Uint8Array;
}

export type AnimationRepeat = 'infinite' | number;

export interface AnimationEncoder {
  encodeAnimation(width: number, height: number, frames: readonly Uint8Array[], repeat: AnimationRepeat): Uint8Array;
}
