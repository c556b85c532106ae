export const NAME = 'voxgrid';
export const VERSION = '0.1.0';
