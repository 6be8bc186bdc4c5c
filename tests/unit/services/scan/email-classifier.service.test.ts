import { describe, test, expect } from '@jest/globals';
import { EmailClassifierService } from '@/services/scan/email-classifier.service';

describe('EmailClassifierService', () => {
    const classifier = new EmailClassifierService();

    test('bulk senders matching a pattern are deleted', () => {
        expect(classifier.classify('newsletter@updates.com', 'Weekly Digest', 'newsletter@updates.com'))
            .toEqual({ action: 'delete', reason: 'Contains pattern: newsletter' });
    });

    test('personal mail is kept', () => {
        expect(classifier.classify('friend@gmail.com', 'Dinner Friday?', 'Friend <friend@gmail.com>'))
            .toEqual({ action: 'keep', reason: 'not unnecessary' });
    });

    test('patterns are regular expressions matched case-insensitively', () => {
        expect(classifier.classify('bob@example.com', 'Hi', 'LinkedIn Invitations <bob@example.com>'))
            .toEqual({ action: 'delete', reason: 'Contains pattern: linkedin.*invitation' });
    });

    test('sender domains match as substrings', () => {
        expect(classifier.classify('billing@mailchimp.com', 'Your invoice', 'billing@mailchimp.com'))
            .toEqual({ action: 'delete', reason: 'Sender domain: mailchimp.com' });
        expect(classifier.classify('bounce@us1.sendgrid.net', 'Receipt', 'bounce@us1.sendgrid.net'))
            .toEqual({ action: 'delete', reason: 'Sender domain: sendgrid.net' });
    });

    test('sender local parts are checked for keywords', () => {
        expect(classifier.classify('hello@startup.io', 'Quick question', 'hello@startup.io'))
            .toEqual({ action: 'delete', reason: 'Sender name contains: hello' });
    });

    test('subjects are checked for promotional keywords', () => {
        expect(classifier.classify('store@shop.example', 'Free shipping this week', 'store@shop.example'))
            .toEqual({ action: 'delete', reason: 'Promotional keyword: free shipping' });
        expect(classifier.classify('store@shop.example', '20% off everything', 'store@shop.example'))
            .toEqual({ action: 'delete', reason: 'Promotional keyword: % off' });
    });

    test('the same input always classifies the same way', () => {
        const first = classifier.classify('alerts@bank.example', 'Security alert for your account', '');
        const second = classifier.classify('alerts@bank.example', 'Security alert for your account', '');
        expect(second).toEqual(first);
        expect(first).toEqual({ action: 'delete', reason: 'Contains pattern: alert.*account' });
    });

    test('empty inputs are kept', () => {
        expect(classifier.classify('', '', '')).toEqual({ action: 'keep', reason: 'not unnecessary' });
    });

    test('custom rules replace the defaults and invalid patterns match literally', () => {
        const custom = new EmailClassifierService({
            patterns: ['[unclosed'],
            domains: [],
            senderKeywords: [],
            promoKeywords: []
        });

        expect(custom.classify('a@b.example', 'About [unclosed brackets', ''))
            .toEqual({ action: 'delete', reason: 'Contains pattern: [unclosed' });
        expect(custom.classify('newsletter@updates.com', 'Weekly Digest', ''))
            .toEqual({ action: 'keep', reason: 'not unnecessary' });
    });
});
