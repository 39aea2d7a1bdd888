import {Readable} from 'node:stream';

import type {StructuredLogger} from '@gatewire/logging';
import {z} from 'zod';

import type {RequestHandlingConfig} from './config';
import type {RequestContext} from './context';
import type {HttpOutcome} from './outcomes';

export const GatewayVariablesSchema = z
  .record(z.string(), z.string())
  .refine(variables => !Object.keys(variables).some(key => key.length === 0), {
    message: 'Gateway variable names must not be empty'
  });

export const GatewayEnvironmentSchema = z
  .object({
    variables: GatewayVariablesSchema,
    input: z.custom<Readable>(value => value instanceof Readable, {message: 'input must be a readable stream'})
  })
  .strict();

/** CGI-style request metadata plus the request body stream. */
export type GatewayEnvironment = z.infer<typeof GatewayEnvironmentSchema>;

export const INPUT_SOURCES = ['get', 'post', 'both'] as const;
export type InputSource = (typeof INPUT_SOURCES)[number];

/** Builds an error outcome for a nested application; receives the context it should describe. */
export type OutcomeProducer = (ctx: RequestContext) => HttpOutcome;

/**
 * A routing scope on the nested application stack. The innermost scope's
 * producers replace the default body of 404, 451 and 500 outcomes that are
 * built without an explicit message.
 */
export type ApplicationScope = {
  name?: string;
  /** Path prefix the scope is mounted under, relative to the enclosing scope. */
  mountPath?: string;
  notFound?: OutcomeProducer;
  unavailableForLegalReasons?: OutcomeProducer;
  internalError?: OutcomeProducer;
};

export type RequestContextOptions = {
  config?: Partial<RequestHandlingConfig>;
  logger?: StructuredLogger;
  applications?: ApplicationScope[];
  now?: () => Date;
};
