export interface HeldNote {
  note: number;
  velocity: number;
}

/**
 * Notes actuellement tenues, dans l'ordre du premier NoteOn.
 * La note "active" (celle qui colore l'ampoule) est la plus ancienne encore tenue.
 *
 * S'appuie sur l'ordre d'insertion garanti de `Map`: réaffecter une clé existante
 * ne la déplace pas, un re-déclenchement garde donc sa position.
 */
export class ActiveNoteTracker {
  private readonly held = new Map<number, number>();

  /** Vélocité 0: aucune modification (voir la politique `zero_velocity` du router). */
  noteOn(note: number, velocity: number): void {
    if (velocity === 0) return;
    this.held.set(note, velocity);
  }

  noteOff(note: number): void {
    this.held.delete(note);
  }

  activeNote(): HeldNote | null {
    for (const [note, velocity] of this.held) {
      return { note, velocity };
    }
    return null;
  }

  get size(): number {
    return this.held.size;
  }

  /** Copie ordonnée, pour les logs et les tests. */
  snapshot(): HeldNote[] {
    return Array.from(this.held, ([note, velocity]) => ({ note, velocity }));
  }

  clear(): void {
    this.held.clear();
  }
}
