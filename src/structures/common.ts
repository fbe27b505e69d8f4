import { z } from 'zod';

/** A base-62 number stored as a string. */
export const idSchema = z.string();

/** ISO-8601 timestamps, decoded into `Date`. Anything but a timestamp string is an issue. */
export const datetimeSchema = z.string().datetime({ offset: true }).pipe(z.coerce.date());

/** Which side of a game a project has to be installed on. */
export const sideTypeSchema = z.enum(['required', 'optional', 'unsupported', 'unknown']);
export type SideType = z.infer<typeof sideTypeSchema>;
