/**
 * Tests for the outline command output
 */

import { modeOf, runOutline } from '../src/cli/run-outline';
import { TextSink } from '../src/server/outline/serializers';

class StringSink implements TextSink {
    public text = '';

    write(chunk: string): void {
        this.text += chunk;
    }
}

const CLASS_A = 'class A { public function bar(): int { return 1; } }';

describe('modeOf', () => {
    it('should default to the legacy format', () => {
        expect(modeOf({})).toBe('legacy');
        expect(modeOf({ json: true })).toBe('json');
        expect(modeOf({ print: true })).toBe('print');
        expect(modeOf({ json: true, print: true })).toBe('print');
    });
});

describe('runOutline', () => {
    it('should write the legacy list as one JSON line', () => {
        const sink = new StringSink();
        runOutline(CLASS_A, 'legacy', sink);

        expect(sink.text).toBe(
            '[{"name":"A","type":"class","line":1,"char_start":7,"char_end":7},' +
            '{"name":"A::bar","type":"method","line":1,"char_start":27,"char_end":29}]\n'
        );
    });

    it('should write the structured tree as one JSON line', () => {
        const sink = new StringSink();
        runOutline('function f() {}', 'json', sink, 'f.php');

        expect(sink.text).toBe(
            '[{"kind":"function","name":"f","' +
            'position":{"filename":"f.php","line":1,"char_start":10,"char_end":10},' +
            '"span":{"filename":"f.php","line_start":1,"char_start":1,"line_end":1,"char_end":15},' +
            '"modifiers":[],"children":[]}]\n'
        );
    });

    it('should print the debug dump', () => {
        const sink = new StringSink();
        runOutline('function f() {}', 'print', sink);

        expect(sink.text).toBe(
            'f\n' +
            '  kind: function\n' +
            '  position: File "", line 1, characters 10-10:\n' +
            '  span: File "", line 1, character 1 - line 1, character 15:\n' +
            '  modifiers: \n\n'
        );
    });

    it('should write an empty list for a file without declarations', () => {
        const sink = new StringSink();
        runOutline('<?hh\necho 1;\n', 'legacy', sink);

        expect(sink.text).toBe('[]\n');
    });
});
