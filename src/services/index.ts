export { MupdfRenderer, MupdfDocument } from './mupdf.renderer.js';
export { SharpImageCodec } from './sharp.codec.js';
