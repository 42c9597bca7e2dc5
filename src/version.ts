export const NAME = 'pysmith';
export const VERSION = '0.1.0';
