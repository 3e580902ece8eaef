import { getCliOutput } from '../cli/context.js';
import type { OutputPort } from '../core/ports/output.js';
import { Session } from '../core/session.js';
import type { TargetSelection } from '../types/index.js';

/**
 * Open a session for one command and close it whatever happens.
 */
export async function withSession<T>(
  selection: TargetSelection | null,
  fn: (session: Session, output: OutputPort) => Promise<T>
): Promise<T> {
  const output = getCliOutput();
  const session = await Session.open(selection, output);
  try {
    return await fn(session, output);
  } finally {
    await session.close();
  }
}
