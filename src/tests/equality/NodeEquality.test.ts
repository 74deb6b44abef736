import { describe, it, expect } from '@jest/globals';
import { Document } from '../../dom/Document.js';
import { isEqualNode } from '../../equality/NodeEquality.js';
import { buildSampleTree } from '../helpers.js';

const SVG_NS = 'http://www.w3.org/2000/svg';

describe('isEqualNode', () => {
    it('treats a node as equal to itself', () => {
        const { a } = buildSampleTree();
        expect(isEqualNode(a, a)).toBe(true);
        expect(a.isEqualNode(a)).toBe(true);
        expect(a.isEqualNode(null)).toBe(false);
    });

    it('compares separately built trees structurally', () => {
        const left = buildSampleTree();
        const right = buildSampleTree();

        expect(left.root === right.root).toBe(false);
        expect(isEqualNode(left.root, right.root)).toBe(true);
        expect(isEqualNode(left.doc, right.doc)).toBe(true);
        expect(isEqualNode(left.a, right.d)).toBe(false);
    });

    it('requires both child lists to end together', () => {
        const left = buildSampleTree();
        const right = buildSampleTree();
        right.a.appendChild(right.doc.createElement('e'));

        expect(isEqualNode(left.root, right.root)).toBe(false);
        expect(isEqualNode(right.root, left.root)).toBe(false);
    });

    it('ignores attribute order but not attribute values', () => {
        const doc = new Document();
        const first = doc.createElement('div');
        first.setAttribute('x', '1');
        first.setAttribute('y', '2');
        const second = doc.createElement('div');
        second.setAttribute('y', '2');
        second.setAttribute('x', '1');

        expect(isEqualNode(first, second)).toBe(true);

        second.setAttribute('x', '3');
        expect(isEqualNode(first, second)).toBe(false);

        second.setAttribute('x', '1');
        second.setAttribute('z', '');
        expect(isEqualNode(first, second)).toBe(false);
    });

    it('distinguishes namespaces and prefixes', () => {
        const doc = new Document();
        expect(isEqualNode(doc.createElement('svg'), doc.createElementNS(SVG_NS, 'svg'))).toBe(false);
        expect(isEqualNode(doc.createElementNS(SVG_NS, 's:svg'), doc.createElementNS(SVG_NS, 'svg'))).toBe(false);
        expect(isEqualNode(doc.createElementNS(SVG_NS, 'svg'), doc.createElementNS(SVG_NS, 'svg'))).toBe(true);
    });

    it('compares character data by kind and content', () => {
        const doc = new Document();
        expect(isEqualNode(doc.createTextNode('x'), doc.createTextNode('x'))).toBe(true);
        expect(isEqualNode(doc.createTextNode('x'), doc.createTextNode('y'))).toBe(false);
        expect(isEqualNode(doc.createTextNode('x'), doc.createComment('x'))).toBe(false);
        expect(isEqualNode(doc.createCDATASection('x'), doc.createTextNode('x'))).toBe(false);
    });

    it('compares processing instructions by target and data', () => {
        const doc = new Document();
        const pi = doc.createProcessingInstruction('xml-stylesheet', 'href="a.css"');
        expect(isEqualNode(pi, doc.createProcessingInstruction('xml-stylesheet', 'href="a.css"'))).toBe(true);
        expect(isEqualNode(pi, doc.createProcessingInstruction('other', 'href="a.css"'))).toBe(false);
        expect(isEqualNode(pi, doc.createProcessingInstruction('xml-stylesheet', 'href="b.css"'))).toBe(false);
    });

    it('compares doctypes by name and identifiers', () => {
        const doc = new Document();
        expect(isEqualNode(doc.createDocumentType('html'), doc.createDocumentType('html'))).toBe(true);
        expect(isEqualNode(doc.createDocumentType('html'), doc.createDocumentType('html', '-//W3C//DTD HTML 4.01//EN'))).toBe(false);
        expect(isEqualNode(doc.createDocumentType('html', '', 'a.dtd'), doc.createDocumentType('html', '', 'b.dtd'))).toBe(false);
    });

    it('compares attribute nodes by namespace, local name and value', () => {
        const doc = new Document();
        const left = doc.createAttribute('title');
        const right = doc.createAttribute('title');
        expect(isEqualNode(left, right)).toBe(true);

        right.value = 'changed';
        expect(isEqualNode(left, right)).toBe(false);
    });

    it('compares nodes from different documents', () => {
        const one = new Document();
        const two = new Document();
        const left = one.createElement('p');
        left.appendChild(one.createTextNode('hello'));
        const right = two.createElement('p');
        right.appendChild(two.createTextNode('hello'));

        expect(isEqualNode(left, right)).toBe(true);
    });

    it('compares fragments and documents by their children', () => {
        const doc = new Document();
        const left = doc.createDocumentFragment();
        const right = doc.createDocumentFragment();
        expect(isEqualNode(left, right)).toBe(true);

        left.appendChild(doc.createElement('p'));
        expect(isEqualNode(left, right)).toBe(false);

        expect(isEqualNode(new Document(), new Document())).toBe(true);
        expect(isEqualNode(new Document(), right)).toBe(false);
    });
});
