// Fixed layout of a PS1 memory card image.
export const FRAME_SIZE = 0x80;
export const BLOCK_SIZE = 0x2000;
export const FRAMES_PER_BLOCK = BLOCK_SIZE / FRAME_SIZE; // 64

export const CARD_BLOCKS = 16;
export const CARD_SIZE = CARD_BLOCKS * BLOCK_SIZE; // 131072
export const DATA_BLOCKS = CARD_BLOCKS - 1;

// InfoBlock layout: header + 15 + 20 + 27 + write-test header = 64 frames
export const DIRECTORY_FRAMES = 15;
export const BROKEN_FRAMES = 20;
export const UNUSED_FRAMES = 27;

// Checksum byte is the last byte of every checksummed frame
export const CHECKSUM_OFFSET = FRAME_SIZE - 1;

// Save icons are 16x16, 4 bits per pixel (one frame per animation step)
export const ICON_SIZE = 16;
export const ICON_PALETTE_ENTRIES = 16;
