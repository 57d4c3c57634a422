export const ROUTE_OPERATIONS = {
  UPLOAD: 'guard.upload',
  HEALTH: 'guard.health',
} as const
