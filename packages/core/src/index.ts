export * from './card/constants.js';
export * from './card/errors.js';
export * from './card/checksum.js';
export * from './card/frames.js';
export * from './card/title.js';
export * from './card/directory.js';
export * from './card/info_block.js';
export * from './card/data_block.js';
export * from './card/memcard.js';
export * from './gfx/icon_textures.js';
export * from './gfx/encoders.js';
export * from './io/byte_stream.js';
