import { z } from 'zod';

export const InterceptorOptionsSchema = z.object({
  /**
   * Route errors thrown by the generator to the recovery function as
   * Severity.Error reports. Off by default: thrown errors propagate.
   */
  catchThrown: z.boolean().default(false),

  /**
   * Redirect process.emitWarning() into the capture for the duration of the
   * call.
   */
  captureProcessWarnings: z.boolean().default(false),
});

export type InterceptorOptions = z.infer<typeof InterceptorOptionsSchema>;
