/**
 * Index plan, applied lazily by each store on first use:
 * - recorded instances: unique { formId, instanceId }
 */
export const mongoIndexes = {
  recordedInstances: [
    { keys: { formId: 1, instanceId: 1 }, options: { unique: true } }
  ]
} as const;
