import type {
  Action,
  OutcomeRecord,
  TrackerStats,
  UserState,
  UserStatus,
} from './types.js'

export interface UserStateTrackerOptions {
  /** Warnings that lock a user out. Default 3. */
  maxWarnings?: number
}

/**
 * UserStateTracker - warning counts and lockouts per user.
 *
 * Every method is synchronous, so each read-modify-write on a record runs
 * to completion before another request for the same user is handled.
 * Records live until reset() or the end of the process; a block is never
 * lifted on a timer.
 */
export class UserStateTracker {
  readonly maxWarnings: number
  private readonly users = new Map<string, UserState>()

  constructor(options: UserStateTrackerOptions = {}) {
    this.maxWarnings = options.maxWarnings ?? 3
    if (!Number.isInteger(this.maxWarnings) || this.maxWarnings < 1) {
      throw new RangeError(`maxWarnings must be a positive integer, got ${this.maxWarnings}`)
    }
  }

  private getState(userId: string): UserState {
    let state = this.users.get(userId)
    if (!state) {
      state = { warningCount: 0, blocked: false }
      this.users.set(userId, state)
    }
    return state
  }

  /**
   * Apply an action to a user's record and report the effective outcome.
   */
  recordOutcome(userId: string, action: Action): OutcomeRecord {
    if (this.isBlocked(userId)) {
      return { action: 'block', blocked: true, transition: 'already-blocked' }
    }

    // Allowed outcomes leave no record behind
    if (action === 'allow') {
      return { action: 'allow', blocked: false, transition: 'none' }
    }

    const state = this.getState(userId)

    switch (action) {
      case 'warn':
        state.warningCount++
        if (state.warningCount >= this.maxWarnings) {
          state.blocked = true
          return { action: 'escalate', blocked: true, transition: 'lockout' }
        }
        return { action: 'warn', blocked: false, transition: 'warning' }

      case 'block':
        // Counts toward lockout but never locks out by itself
        state.warningCount++
        return { action: 'block', blocked: false, transition: 'violation' }

      case 'escalate':
        state.blocked = true
        return { action: 'escalate', blocked: true, transition: 'escalation' }
    }
  }

  isBlocked(userId: string): boolean {
    return this.users.get(userId)?.blocked ?? false
  }

  /**
   * Snapshot of a user's record. Unknown users read as zero state and no
   * record is created.
   */
  status(userId: string): UserStatus {
    const state = this.users.get(userId)
    return {
      userId,
      warnings: state?.warningCount ?? 0,
      isBlocked: state?.blocked ?? false,
      maxWarnings: this.maxWarnings,
    }
  }

  /**
   * Clear a user's warnings and block.
   */
  reset(userId: string): void {
    this.users.delete(userId)
  }

  /**
   * Number of users with a record.
   */
  get trackedUsers(): number {
    return this.users.size
  }

  stats(): TrackerStats {
    let blockedUsers = 0
    let totalWarnings = 0
    for (const state of this.users.values()) {
      if (state.blocked) blockedUsers++
      totalWarnings += state.warningCount
    }
    return { blockedUsers, totalWarnings }
  }
}
