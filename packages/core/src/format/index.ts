export { default as formatRupiah } from './format-rupiah.js';
