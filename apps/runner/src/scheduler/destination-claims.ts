import type { AcceptedJob, Track } from "@trackpress/core";

export interface DestinationClaim {
  path: string;
  jobIndex: number;
  track: Track;
}

// Output paths claimed in input order: the first entry to name a path owns it.
export class DestinationClaims {
  private readonly owners = new Map<string, DestinationClaim>();

  claim(path: string, jobIndex: number, track: Track): DestinationClaim {
    const existing = this.owners.get(path);
    if (existing) {
      return existing;
    }
    const claim = { path, jobIndex, track };
    this.owners.set(path, claim);
    return claim;
  }

  ownerOf(path: string): DestinationClaim | undefined {
    return this.owners.get(path);
  }

  isOwnedBy(path: string, jobIndex: number): boolean {
    return this.owners.get(path)?.jobIndex === jobIndex;
  }

  get size(): number {
    return this.owners.size;
  }
}

export function buildDestinationClaims(
  jobs: AcceptedJob[],
  destinationOf: (job: AcceptedJob, track: Track) => string,
  tracksOf: (job: AcceptedJob) => readonly Track[],
): DestinationClaims {
  const claims = new DestinationClaims();
  const ordered = [...jobs].sort((left, right) => left.index - right.index);
  for (const job of ordered) {
    for (const track of tracksOf(job)) {
      claims.claim(destinationOf(job, track), job.index, track);
    }
  }
  return claims;
}
