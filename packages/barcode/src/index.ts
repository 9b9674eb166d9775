export { EAN13_LABEL, EAN13_LENGTH, computeEan13CheckDigit, formatEan13, isValidEan13 } from './ean13.js'
