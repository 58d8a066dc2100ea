import { UserInteractionPort } from '../../../src/application/ports';
import { confirmationPrompt, SecurityGate } from '../../../src/application/services/SecurityGate';
import { parseAgentAction } from '../../../src/domain/agent/ActionTypes';
import { ElementRecord } from '../../../src/domain/browser/ElementRecord';

function userAnswering(answer: string): UserInteractionPort & { ask: jest.Mock } {
  return { ask: jest.fn().mockResolvedValue(answer) };
}

describe('SecurityGate', () => {
  it('should let harmless actions through without asking', async () => {
    const user = userAnswering('no');
    const gate = new SecurityGate(user);

    const verdict = await gate.check(parseAgentAction('click_selector', { selector: '#search' }), undefined);

    expect(verdict).toEqual({ proceed: true });
    expect(user.ask).not.toHaveBeenCalled();
  });

  it('should proceed when the operator confirms', async () => {
    const user = userAnswering('yes');
    const gate = new SecurityGate(user);

    const verdict = await gate.check(parseAgentAction('click_selector', { selector: '#delete-account' }), undefined);

    expect(verdict).toEqual({
      proceed: true,
      match: { category: 'deletion', keyword: 'delete', source: '#delete-account' },
    });
    expect(user.ask).toHaveBeenCalledWith(
      confirmationPrompt('click_selector', { selector: '#delete-account' }),
      undefined
    );
  });

  it('should refuse when the operator declines', async () => {
    const gate = new SecurityGate(userAnswering('no thanks'));

    const verdict = await gate.check(parseAgentAction('click_text', { text: 'Unsubscribe' }), undefined);

    expect(verdict).toEqual({
      proceed: false,
      match: { category: 'unsubscribe', keyword: 'unsubscribe', source: 'Unsubscribe' },
      answer: 'no thanks',
    });
  });

  it('should inspect the resolved element of an index click', () => {
    const gate = new SecurityGate(userAnswering('y'));
    const element = ElementRecord.create({ role: 'button', text: 'Buy now', index: 2 });

    expect(gate.inspect(parseAgentAction('click_by_index', { index: 2 }), element)).toEqual({
      category: 'payment',
      keyword: 'buy',
      source: 'Buy now',
    });
  });

  it('should not inspect the text typed by fill', () => {
    const gate = new SecurityGate(userAnswering('no'));

    expect(gate.inspect(parseAgentAction('fill', { selector: '#note', text: 'delete everything' }))).toBeUndefined();
  });

  it('should do nothing when disabled', () => {
    const gate = new SecurityGate(userAnswering('no'), false);

    expect(gate.inspect(parseAgentAction('click_text', { text: 'Delete' }))).toBeUndefined();
  });

  it('should build the confirmation prompt from the targets', () => {
    expect(confirmationPrompt('click_by_index', { role: 'button', text: 'Buy now' })).toBe(
      '⚠️  SECURITY CHECK: This action may be destructive:\nAction: click_by_index on role: button on text: Buy now\n\nDo you want to proceed? (yes/no): '
    );
  });
});
