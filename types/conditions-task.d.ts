/**
 * Administrative task a global tag upload or update request belongs to.
 * `master` is kept for backward compatibility with `main`.
 */
export type ConditionsTask =
  | 'validation'
  | 'analysis'
  | 'master'
  | 'online'
  | 'prompt'
  | 'main'
  | 'data'
  | 'mc'
