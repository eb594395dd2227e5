export interface Actor {
  id: string;
  displayName?: string;
  roleIds: string[];
}

export type ReviewerPredicate = (actor: Actor) => boolean;

export function actorLabel(actor: Actor): string {
  return actor.displayName ?? actor.id;
}
