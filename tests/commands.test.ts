import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { handleCommand, HELP_TEXT, type CommandContext } from '../src/commands.js';

const URL_ONE = 'https://github.com/acme/widgets/pull/1';

function makeContext(refresh: () => Promise<void> = async () => {}) {
  const target = {
    markAllSeen: vi.fn(),
    refreshNow: vi.fn(refresh),
    openPR: vi.fn(),
  };
  const openUrl = vi.fn();
  const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  const ctx: CommandContext = {
    target,
    urlAt: (position) => (position === 1 ? URL_ONE : undefined),
    openUrl,
    logger,
  };
  return { ctx, target, openUrl, logger };
}

describe('handleCommand', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  it('quits on q', () => {
    const { ctx } = makeContext();
    expect(handleCommand('q', ctx)).toBe('quit');
    expect(handleCommand(' QUIT ', ctx)).toBe('quit');
  });

  it('marks all seen on m', () => {
    const { ctx, target } = makeContext();
    expect(handleCommand('m', ctx)).toBe('continue');
    expect(target.markAllSeen).toHaveBeenCalledOnce();
  });

  it('refreshes on r', () => {
    const { ctx, target } = makeContext();
    expect(handleCommand('r', ctx)).toBe('continue');
    expect(target.refreshNow).toHaveBeenCalledOnce();
  });

  it('logs a failed refresh', async () => {
    const { ctx, logger } = makeContext(() => Promise.reject(new Error('gh not found')));
    handleCommand('r', ctx);
    await vi.waitFor(() => expect(logger.error).toHaveBeenCalledWith('Refresh failed: gh not found'));
  });

  it('opens and acknowledges a PR by row number', () => {
    const { ctx, target, openUrl } = makeContext();
    handleCommand('1', ctx);
    expect(target.openPR).toHaveBeenCalledWith(URL_ONE);
    expect(openUrl).toHaveBeenCalledWith(URL_ONE);
  });

  it('warns about a row that does not exist', () => {
    const { ctx, target, openUrl, logger } = makeContext();
    handleCommand('5', ctx);
    expect(target.openPR).not.toHaveBeenCalled();
    expect(openUrl).not.toHaveBeenCalled();
    expect(logger.warn).toHaveBeenCalledWith('No PR at row 5');
  });

  it('prints help', () => {
    const { ctx } = makeContext();
    handleCommand('?', ctx);
    expect(logSpy).toHaveBeenCalledWith(HELP_TEXT);
  });

  it('ignores blank lines and warns about unknown input', () => {
    const { ctx, logger } = makeContext();
    expect(handleCommand('   ', ctx)).toBe('continue');
    expect(logger.warn).not.toHaveBeenCalled();

    handleCommand('x', ctx);
    expect(logger.warn).toHaveBeenCalledWith("Unknown command 'x' (h for help)");
  });
});
