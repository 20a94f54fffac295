import { TrackStore, normalizeIdentifier } from '../tracks/track-store';
import { MergeResult, SourcedReport, Track } from '../tracks/track.types';

export interface FusionSource {
  name: string;
  priority: number;
}

export interface FusionStats {
  totalSources: number;
  connectedSources: number;
  totalTracks: number;
  totalMessages: number;
  messagesBySource: Record<string, number>;
}

/**
 * Merges reports from independently configured feeds into one track store.
 *
 * A report whose priority is at least that of the track's current primary
 * source takes over as primary and overwrites the fields it carries; ties go
 * to the incoming report. A lower-priority report only registers its source
 * as contributing, so a remote aggregator can vouch for an aircraft without
 * overriding a co-located receiver's data.
 */
export class FusionEngine {
  private readonly priorities = new Map<string, number>();
  private readonly messageCounts = new Map<string, number>();
  private readonly lowestPriority: number;

  constructor(
    sources: FusionSource[],
    private readonly store: TrackStore,
  ) {
    for (const source of sources) {
      this.priorities.set(source.name, source.priority);
    }
    this.lowestPriority = sources.length > 0 ? Math.min(...sources.map((s) => s.priority)) : 0;
  }

  /**
   * Priority a report is judged by: its own when it carries one, otherwise the
   * configured priority of its source, otherwise the lowest configured one.
   */
  resolvePriority(report: Pick<SourcedReport, 'sourceName' | 'sourcePriority'>): number {
    if (report.sourcePriority !== undefined && Number.isFinite(report.sourcePriority)) {
      return report.sourcePriority;
    }
    return this.priorities.get(report.sourceName) ?? this.lowestPriority;
  }

  mergeReport(report: SourcedReport, now = Date.now()): MergeResult {
    if (
      !report.sourceName ||
      typeof report.identifier !== 'string' ||
      !normalizeIdentifier(report.identifier)
    ) {
      return { outcome: 'ignored', overwritten: false };
    }

    const priority = this.resolvePriority(report);
    const result = this.store.merge(report.identifier, report, now, (track) =>
      priority >= this.primaryPriority(track),
    );

    if (!result.track) {
      return result;
    }

    this.messageCounts.set(report.sourceName, (this.messageCounts.get(report.sourceName) ?? 0) + 1);

    result.track.sources.set(report.sourceName, {
      sourceName: report.sourceName,
      priority,
      lastUpdate: now,
    });
    if (result.overwritten) {
      result.track.primarySource = report.sourceName;
    }
    return result;
  }

  /** `connectedSources` comes from the feed layer, which owns connection state. */
  getStats(connectedSources = 0): FusionStats {
    const messagesBySource: Record<string, number> = {};
    let totalMessages = 0;
    for (const [source, count] of this.messageCounts) {
      messagesBySource[source] = count;
      totalMessages += count;
    }

    return {
      totalSources: this.priorities.size,
      connectedSources,
      totalTracks: this.store.size,
      totalMessages,
      messagesBySource,
    };
  }

  private primaryPriority(track: Track): number {
    if (!track.primarySource) {
      return Number.NEGATIVE_INFINITY;
    }
    return track.sources.get(track.primarySource)?.priority ?? this.lowestPriority;
  }
}
