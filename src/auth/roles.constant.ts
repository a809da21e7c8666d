export const CAPABILITIES_KEY = 'capabilities';
