import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import type { BackendOutcome } from '../git/backend.js';
import { CommitFlowState } from './CommitFlowState.js';

describe('CommitFlowState', () => {
  let getHeadMessage: Mock<() => Promise<string>>;
  let onCommit: Mock<(message: string, amend: boolean) => Promise<BackendOutcome>>;
  let flow: CommitFlowState;

  beforeEach(() => {
    getHeadMessage = vi.fn(async () => 'Initial commit');
    onCommit = vi.fn(async (): Promise<BackendOutcome> => ({ ok: true }));
    flow = new CommitFlowState({ getHeadMessage, onCommit });
    flow.setStagedCount(1);
  });

  it('edits the buffer', () => {
    flow.insert('Fix');
    flow.insert('x');
    flow.backspace();
    flow.newline();
    flow.insert('body');
    expect(flow.state.message).toBe('Fix\nbody');

    flow.clear();
    expect(flow.state.message).toBe('');
  });

  it('deletes a whole character on backspace', () => {
    flow.insert('café\u{1F600}');
    flow.backspace();
    expect(flow.state.message).toBe('café');
  });

  it('loads the HEAD message when amending an empty buffer', async () => {
    await flow.toggleAmend();
    expect(flow.state).toMatchObject({ amend: true, message: 'Initial commit' });
  });

  it('keeps typed text when amend is turned on', async () => {
    flow.insert('Reworded');
    await flow.toggleAmend();
    expect(flow.state.message).toBe('Reworded');
    expect(getHeadMessage).not.toHaveBeenCalled();
  });

  it('submits the cleaned message and resets', async () => {
    flow.insert('Fix parser  \n\n');
    await expect(flow.submit()).resolves.toBe(true);
    expect(onCommit).toHaveBeenCalledWith('Fix parser', false);
    expect(flow.state.message).toBe('');
  });

  it('keeps the buffer open when validation fails', async () => {
    flow.setStagedCount(0);
    flow.insert('Fix parser');

    await expect(flow.submit()).resolves.toBe(false);

    expect(onCommit).not.toHaveBeenCalled();
    expect(flow.state).toMatchObject({
      message: 'Fix parser',
      error: 'No changes staged for commit',
    });
  });

  it('keeps the buffer when the commit fails', async () => {
    onCommit.mockResolvedValueOnce({ ok: false, reason: 'hook rejected the commit' });
    flow.insert('Fix parser');

    await expect(flow.submit()).resolves.toBe(false);

    expect(flow.state).toMatchObject({
      message: 'Fix parser',
      isCommitting: false,
      error: 'hook rejected the commit',
    });
  });

  it('clears the error on the next edit', async () => {
    await flow.submit();
    expect(flow.state.error).toBe('Commit message cannot be empty');
    flow.insert('F');
    expect(flow.state.error).toBeNull();
  });
});
