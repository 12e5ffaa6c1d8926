/**
 * MESSAGE FORMATTER TESTS
 * =======================
 */

import {
  escapeHtml,
  formatMessage,
  formatSignedUsd,
  formatTime,
  formatUsd,
  shortenAddress,
} from '../src/alerts/message-formatter';
import { ADDRESS, fill, pos } from './fixtures';

const context = { address: ADDRESS, now: new Date(1_700_000_000_000) };

const FOOTER = [
  '',
  '<b>Address:</b> <code>0x123456...345678</code>',
  '<b>Time:</b> 2023-11-14 22:13:20 UTC',
];

describe('formatMessage', () => {
  it('formats an opened position', () => {
    const text = formatMessage(
      { kind: 'position_opened', position: pos('BTC', 0.5, { entryPrice: 65000, leverage: 10, positionValue: 32500, unrealizedPnl: 0 }) },
      context,
    );

    expect(text.split('\n')).toEqual([
      '🔔 <b>Position OPENED</b>',
      '',
      '<b>Asset:</b> BTC',
      '<b>Side:</b> LONG',
      '<b>Size:</b> 0.5',
      '<b>Entry Price:</b> $65000',
      '<b>Leverage:</b> 10x',
      '<b>Position Value:</b> $32500.00',
      '<b>Unrealized PnL:</b> $0.00',
      ...FOOTER,
    ]);
  });

  it('formats a modified position with a side flip', () => {
    const text = formatMessage(
      {
        kind: 'position_modified',
        previous: pos('ETH', 2),
        current: pos('ETH', 1, { side: 'SHORT', entryPrice: 3100, leverage: 3, positionValue: 3100, unrealizedPnl: 25.5 }),
      },
      context,
    );

    expect(text.split('\n')).toEqual([
      '🔔 <b>Position MODIFIED</b>',
      '',
      '<b>Asset:</b> ETH',
      '<b>Side:</b> LONG → SHORT',
      '<b>Size:</b> 2 → 1',
      '<b>Entry Price:</b> $3100',
      '<b>Leverage:</b> 3x',
      '<b>Position Value:</b> $3100.00',
      '<b>Unrealized PnL:</b> +$25.50',
      ...FOOTER,
    ]);
  });

  it('shows a single side when a resize keeps the direction', () => {
    const text = formatMessage(
      { kind: 'position_modified', previous: pos('ETH', 2), current: pos('ETH', 3) },
      context,
    );

    expect(text.split('\n')[3]).toBe('<b>Side:</b> LONG');
  });

  it('formats a closed position with its last known state', () => {
    const text = formatMessage(
      { kind: 'position_closed', position: pos('SOL', 10, { entryPrice: 150, unrealizedPnl: -7.25 }) },
      context,
    );

    expect(text.split('\n')).toEqual([
      '🔵 <b>Position CLOSED</b>',
      '',
      '<b>Asset:</b> SOL',
      '<b>Side:</b> LONG',
      '<b>Previous Size:</b> 10',
      '<b>Entry Price:</b> $150',
      '<b>Last Unrealized PnL:</b> -$7.25',
      ...FOOTER,
    ]);
  });

  it('formats a trade stamped with its own execution time', () => {
    const text = formatMessage(
      {
        kind: 'new_trade',
        fill: fill('42', Date.UTC(2024, 2, 9, 14, 5, 0), {
          side: 'SELL',
          price: 64000.5,
          size: 0.25,
          fee: 1.5,
          direction: 'Close Long',
          closedPnl: -12.5,
        }),
      },
      context,
    );

    expect(text.split('\n')).toEqual([
      '🔴 <b>NEW TRADE</b>',
      '',
      '<b>Asset:</b> BTC',
      '<b>Side:</b> SELL',
      '<b>Price:</b> $64000.5',
      '<b>Size:</b> 0.25',
      '<b>Fee:</b> $1.5',
      '<b>Direction:</b> Close Long',
      '<b>Closed PnL:</b> -$12.50',
      '<b>Trade ID:</b> <code>42</code>',
      '',
      '<b>Address:</b> <code>0x123456...345678</code>',
      '<b>Time:</b> 2024-03-09 14:05:00 UTC',
    ]);
  });

  it('leaves out direction and a zero closed PnL on a plain buy', () => {
    const text = formatMessage({ kind: 'new_trade', fill: fill('7', 0, { closedPnl: 0 }) }, context);
    const lines = text.split('\n');

    expect(lines[0]).toBe('🟢 <b>NEW TRADE</b>');
    expect(lines.slice(2, 8)).toEqual([
      '<b>Asset:</b> BTC',
      '<b>Side:</b> BUY',
      '<b>Price:</b> $65000',
      '<b>Size:</b> 0.1',
      '<b>Fee:</b> $1.5',
      '<b>Trade ID:</b> <code>7</code>',
    ]);
  });

  it('formats the startup message with current holdings', () => {
    const text = formatMessage(
      {
        kind: 'startup',
        address: ADDRESS,
        positions: [
          pos('BTC', 0.5, { entryPrice: 65000, leverage: 10 }),
          pos('ETH', 2, { side: 'SHORT', entryPrice: 3200, leverage: 5 }),
        ],
        fillCount: 7,
        at: context.now,
      },
      context,
    );

    expect(text.split('\n')).toEqual([
      '✅ <b>Monitoring Started</b>',
      '',
      'Now monitoring address:',
      `<code>${ADDRESS}</code>`,
      '',
      '<b>Open positions:</b> 2',
      '• LONG 0.5 BTC @ $65000 (10x)',
      '• SHORT 2 ETH @ $3200 (5x)',
      '<b>Recent fills:</b> 7',
      '',
      'You will receive notifications for:',
      '• New positions opened',
      '• Positions closed',
      '• Position size changes',
      '• New trades executed',
    ]);
  });

  it('says none when the account starts flat', () => {
    const text = formatMessage(
      { kind: 'startup', address: ADDRESS, positions: [], fillCount: 0, at: context.now },
      context,
    );

    expect(text.split('\n').slice(5, 7)).toEqual(['<b>Open positions:</b> none', '<b>Recent fills:</b> 0']);
  });

  it('caps the startup holdings list', () => {
    const positions = Array.from({ length: 22 }, (_, i) => pos(`A${String(i).padStart(2, '0')}`, 1));
    const lines = formatMessage(
      { kind: 'startup', address: ADDRESS, positions, fillCount: 0, at: context.now },
      context,
    ).split('\n');

    expect(lines[5]).toBe('<b>Open positions:</b> 22');
    expect(lines[6]).toBe('• LONG 1 A00 @ $100 (5x)');
    expect(lines[25]).toBe('• LONG 1 A19 @ $100 (5x)');
    expect(lines[26]).toBe('... and 2 more');
    expect(lines[27]).toBe('<b>Recent fills:</b> 0');
  });

  it('formats the shutdown message', () => {
    const text = formatMessage(
      { kind: 'shutdown', address: ADDRESS, reason: 'SIGINT', at: new Date('2024-03-09T14:05:00Z') },
      context,
    );

    expect(text).toBe('⚠️ <b>Monitoring Stopped</b>\n\n<b>Reason:</b> SIGINT\n<b>Time:</b> 2024-03-09 14:05:00 UTC');
  });

  it('formats an error with escaped details', () => {
    const text = formatMessage(
      {
        kind: 'error',
        address: ADDRESS,
        errorKind: 'api',
        message: 'API_ERROR: 502 <Bad Gateway> & more',
        consecutiveFailures: 3,
        at: new Date('2024-03-09T14:05:00Z'),
      },
      context,
    );

    expect(text.split('\n')).toEqual([
      '❌ <b>Monitor Error</b>',
      '',
      '<b>Type:</b> api',
      '<b>Details:</b> <pre>API_ERROR: 502 &lt;Bad Gateway&gt; &amp; more</pre>',
      '<b>Consecutive failures:</b> 3',
      '<b>Time:</b> 2024-03-09 14:05:00 UTC',
    ]);
  });
});

describe('formatting helpers', () => {
  it('shortens long addresses and leaves short ones alone', () => {
    expect(shortenAddress(ADDRESS)).toBe('0x123456...345678');
    expect(shortenAddress('0xabc')).toBe('0xabc');
  });

  it('formats times in UTC', () => {
    expect(formatTime(new Date(Date.UTC(2024, 0, 2, 3, 4, 5)))).toBe('2024-01-02 03:04:05 UTC');
  });

  it('formats dollar amounts', () => {
    expect(formatUsd(1234.5)).toBe('$1234.50');
    expect(formatUsd(-1234.5)).toBe('-$1234.50');
    expect(formatSignedUsd(3)).toBe('+$3.00');
    expect(formatSignedUsd(-0.5)).toBe('-$0.50');
    expect(formatSignedUsd(0)).toBe('$0.00');
  });

  it('escapes HTML special characters', () => {
    expect(escapeHtml('a<b>&c')).toBe('a&lt;b&gt;&amp;c');
  });
});
