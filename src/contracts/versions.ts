export const ENGINE_VERSION = '0.4.0' as const;
export const CONTRACT_VERSION = 'V1' as const;
