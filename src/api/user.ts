import { z } from 'zod';
import type { ModrinthError } from '../error/types.js';
import { type Project, projectSchema } from '../structures/project.js';
import {
  type Notification,
  notificationSchema,
  type Report,
  type ReportSubmission,
  reportSchema,
  type User,
  userSchema,
} from '../structures/user.js';
import type { CallOptions } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { ResourceApi } from './resource.js';

/**
 * Users, their projects, follows and notifications.
 */
export class UserApi extends ResourceApi {
  /**
   * Get the user with ID or username `userId`.
   *
   * @example
   * const [err, user] = await client.users.get('TEZXhE2U');
   */
  get(userId: string, opts?: CallOptions): SafeWrapAsync<ModrinthError, User> {
    return this.read({ segments: ['user', userId], ids: [userId] }, userSchema, opts);
  }

  /**
   * Get the user the configured token belongs to. Requires a token.
   */
  getCurrent(opts?: CallOptions): SafeWrapAsync<ModrinthError, User> {
    return this.read({ segments: ['user'] }, userSchema, opts);
  }

  /**
   * Get several users in one request. The answer is not in the order of `userIds`.
   */
  getMultiple(userIds: readonly string[], opts?: CallOptions): SafeWrapAsync<ModrinthError, User[]> {
    return this.batch('users', userIds, z.array(userSchema), opts);
  }

  /** Projects the user is a member of. */
  listProjects(userId: string, opts?: CallOptions): SafeWrapAsync<ModrinthError, Project[]> {
    return this.read({ segments: ['user', userId, 'projects'], ids: [userId] }, z.array(projectSchema), opts);
  }

  /** Notifications the user received. Requires a token. */
  getNotifications(userId: string, opts?: CallOptions): SafeWrapAsync<ModrinthError, Notification[]> {
    return this.read(
      { segments: ['user', userId, 'notifications'], ids: [userId] },
      z.array(notificationSchema),
      opts,
    );
  }

  /** Projects the user follows. Requires a token. */
  followedProjects(userId: string, opts?: CallOptions): SafeWrapAsync<ModrinthError, Project[]> {
    return this.read({ segments: ['user', userId, 'follows'], ids: [userId] }, z.array(projectSchema), opts);
  }

  /**
   * File a report with the moderators. Requires a token.
   */
  submitReport(report: ReportSubmission, opts?: CallOptions): SafeWrapAsync<ModrinthError, Report> {
    return this.write({ segments: ['report'], ids: [report.item_id] }, report, reportSchema, opts);
  }
}
