import * as assert from 'assert';
import { detectSymbolStyle, resolveSymbolStyle } from './terminal';
import { SymbolStyle } from '../types/compliance';

suite('detectSymbolStyle', () => {
  test('falls back to ASCII on legacy Windows consoles', () => {
    assert.strictEqual(detectSymbolStyle({ platform: 'win32', env: {} }), SymbolStyle.ASCII);
  });

  test('uses Unicode in Windows Terminal and VS Code', () => {
    assert.strictEqual(
      detectSymbolStyle({ platform: 'win32', env: { WT_SESSION: 'session-id' } }),
      SymbolStyle.UNICODE
    );
    assert.strictEqual(
      detectSymbolStyle({ platform: 'win32', env: { TERM_PROGRAM: 'vscode' } }),
      SymbolStyle.UNICODE
    );
  });

  test('follows the locale elsewhere', () => {
    assert.strictEqual(detectSymbolStyle({ platform: 'linux', env: { LANG: 'en_US.UTF-8' } }), SymbolStyle.UNICODE);
    assert.strictEqual(detectSymbolStyle({ platform: 'linux', env: { LC_ALL: 'C.utf8', LANG: 'C' } }), SymbolStyle.UNICODE);
    assert.strictEqual(detectSymbolStyle({ platform: 'darwin', env: { LANG: 'C' } }), SymbolStyle.ASCII);
  });

  test('assumes Unicode without a locale', () => {
    assert.strictEqual(detectSymbolStyle({ platform: 'linux', env: {} }), SymbolStyle.UNICODE);
  });
});

suite('resolveSymbolStyle', () => {
  const legacyConsole = { platform: 'win32' as const, env: {} };

  test('prefers the explicit flag', () => {
    assert.strictEqual(resolveSymbolStyle(SymbolStyle.UNICODE, 'ascii', legacyConsole), SymbolStyle.UNICODE);
  });

  test('uses the configured style before detection', () => {
    assert.strictEqual(resolveSymbolStyle(undefined, 'unicode', legacyConsole), SymbolStyle.UNICODE);
    assert.strictEqual(
      resolveSymbolStyle(undefined, 'ascii', { platform: 'linux', env: {} }),
      SymbolStyle.ASCII
    );
  });

  test('detects when configured as auto', () => {
    assert.strictEqual(resolveSymbolStyle(undefined, 'auto', legacyConsole), SymbolStyle.ASCII);
  });
});
