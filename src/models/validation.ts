import Joi from 'joi';
import {
  APPLICATION_STATUSES,
  ApplicationStatus,
  ClassifierArtifact,
  RawMessage
} from '../types/models';
import { TrackerError } from './errors';

/**
 * Validation schemas and functions for data models
 */

export interface ManualApplicationInput {
  companyName: string;
  title?: string;
  jobId?: string;
  applicationDate?: Date;
  status: ApplicationStatus;
  notes?: string;
}

export interface ParseRequestInput {
  subject: string;
  body: string;
  sender: string;
  messageId?: string;
  receivedAt?: Date;
}

// Validation schemas
export const rawMessageSchema = Joi.object<RawMessage>({
  id: Joi.string().trim().min(1).required(),
  sender: Joi.string().allow('').required(),
  subject: Joi.string().allow('').required(),
  body: Joi.string().allow('').required(),
  receivedAt: Joi.date().required(),
  threadId: Joi.string().optional()
});

export const classifierArtifactSchema = Joi.object<ClassifierArtifact>({
  version: Joi.string().required(),
  vocabulary: Joi.object().pattern(Joi.string(), Joi.number().integer().min(0)).min(1).required(),
  idf: Joi.array().items(Joi.number().min(0)).min(1).required(),
  weights: Joi.array().items(Joi.number()).min(1).required(),
  bias: Joi.number().required(),
  threshold: Joi.number().min(0).max(1).required(),
  ngramRange: Joi.array().ordered(
    Joi.number().integer().min(1),
    Joi.number().integer().min(1)
  ).length(2).default([1, 1])
}).unknown(true);

export const manualApplicationSchema = Joi.object<ManualApplicationInput>({
  companyName: Joi.string().trim().min(1).max(200).required(),
  title: Joi.string().trim().max(200).optional(),
  jobId: Joi.string().trim().max(100).allow('').optional(),
  applicationDate: Joi.date().optional(),
  status: Joi.string().valid(...APPLICATION_STATUSES).default('Applied'),
  notes: Joi.string().max(5000).allow('').optional()
});

export const parseRequestSchema = Joi.object<ParseRequestInput>({
  subject: Joi.string().allow('').required(),
  body: Joi.string().allow('').required(),
  sender: Joi.string().allow('').default(''),
  messageId: Joi.string().trim().min(1).optional(),
  receivedAt: Joi.date().optional()
});

// Validation functions
export function validateRawMessage(message: unknown): { error?: Joi.ValidationError; value?: RawMessage } {
  return rawMessageSchema.validate(message, { abortEarly: false });
}

export function validateClassifierArtifact(artifact: unknown): { error?: Joi.ValidationError; value?: ClassifierArtifact } {
  return classifierArtifactSchema.validate(artifact, { abortEarly: false });
}

export function validateManualApplication(input: unknown): { error?: Joi.ValidationError; value?: ManualApplicationInput } {
  return manualApplicationSchema.validate(input, { abortEarly: false, stripUnknown: true });
}

export function validateParseRequest(input: unknown): { error?: Joi.ValidationError; value?: ParseRequestInput } {
  return parseRequestSchema.validate(input, { abortEarly: false, stripUnknown: true });
}

export function isValidStatus(status: string): status is ApplicationStatus {
  return APPLICATION_STATUSES.some(candidate => candidate === status);
}

// Custom validation error class
export class ValidationError extends TrackerError {
  public details: Joi.ValidationErrorItem[];

  constructor(message: string, details: Joi.ValidationErrorItem[]) {
    super(message, 'VALIDATION');
    this.name = 'ValidationError';
    this.details = details;
  }
}

// Helper function to throw validation errors
export function throwValidationError(result: { error?: Joi.ValidationError }): never {
  if (result.error) {
    throw new ValidationError(result.error.message, result.error.details);
  }
  throw new Error('Validation failed');
}
