export const PRODUCT_NAME = 'FaceFix';
export const VERSION = '0.8.0';
