/**
 * Persona identity: immutable, loaded once at start-up and referenced by id elsewhere.
 */

export interface Persona {
  id: string;
  name: string;
  expertise: string;
  personality: string;
  /** Display glyph (usually an emoji). */
  avatar: string;
  /** Display color (CSS color string). */
  color: string;
  /** Voice id resolved by the speech synthesizer's voice profiles. */
  voice: string;
}
