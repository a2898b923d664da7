export const auditParamsSchema = {
  type: 'object',
  properties: {
    id: { type: 'string', minLength: 1 },
  },
  required: ['id'],
} as const;

export const submitAuditBodySchema = {
  type: 'object',
  properties: {
    fileName: { type: 'string', minLength: 1 },
    segments: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        properties: {
          text: { type: 'string' },
          page: { type: 'integer', minimum: 1 },
          pages: { type: 'array', items: { type: 'integer', minimum: 1 } },
          sectionContext: { type: 'string' },
        },
        required: ['text'],
      },
    },
  },
  required: ['fileName', 'segments'],
} as const;

export const auditStatusResponseSchema = {
  type: 'object',
  properties: {
    id: { type: 'string' },
    fileName: { type: 'string' },
    status: { type: 'string', enum: ['PENDING', 'EXTRACTING', 'ANALYZING', 'COMPLETED', 'FAILED'] },
    progress: { type: 'number' },
    hasReport: { type: 'boolean' },
    createdAt: { type: 'string' },
    updatedAt: { type: 'string' },
  },
  required: ['id', 'fileName', 'status', 'progress', 'hasReport', 'createdAt', 'updatedAt'],
} as const;

export const integrityResponseSchema = {
  type: 'object',
  properties: {
    auditId: { type: 'string' },
    fingerprint: { type: 'string' },
    evidenceIntact: { type: 'boolean' },
    fingerprintIntact: { type: 'boolean' },
  },
  required: ['auditId', 'fingerprint', 'evidenceIntact', 'fingerprintIntact'],
} as const;
