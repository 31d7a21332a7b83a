/**
 * Zod Formset Tests
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { defineForm } from '../zod-form.js';
import { defineFormSet } from '../zod-formset.js';

const AddressForm = defineForm('AddressForm', {
  street: z.string().min(1),
  city: z.string().min(1),
});

const AddressFormSet = defineFormSet('AddressFormSet', AddressForm, { extra: 2, maxNum: 3 });

describe('ZodFormSet', () => {
  it('should render initial items plus extra blank items when unbound', () => {
    const formset = AddressFormSet.create({
      data: null,
      files: null,
      prefix: 'addresses',
      initial: [{ street: 'Main St', city: 'Springfield' }],
    });

    expect(formset.forms.map((form) => form.prefix)).toEqual([
      'addresses-0',
      'addresses-1',
      'addresses-2',
    ]);
    expect(formset.forms[0]?.value('street')).toBe('Main St');
    expect(formset.managementFields()).toEqual({
      'addresses-TOTAL_FORMS': '3',
      'addresses-INITIAL_FORMS': '1',
    });
  });

  it('should bind the submitted number of items', () => {
    const formset = AddressFormSet.create({
      data: {
        'addresses-TOTAL_FORMS': '2',
        'addresses-0-street': 'Main St',
        'addresses-0-city': 'Springfield',
        'addresses-1-street': 'Elm St',
        'addresses-1-city': 'Shelbyville',
      },
      files: null,
      prefix: 'addresses',
      initial: null,
    });

    expect(formset.isValid()).toBe(true);
    expect(formset.cleanedData).toEqual([
      { street: 'Main St', city: 'Springfield' },
      { street: 'Elm St', city: 'Shelbyville' },
    ]);
  });

  it('should key item errors by index', () => {
    const formset = AddressFormSet.create({
      data: {
        'addresses-TOTAL_FORMS': '2',
        'addresses-0-street': 'Main St',
        'addresses-0-city': 'Springfield',
        'addresses-1-street': 'Elm St',
      },
      files: null,
      prefix: 'addresses',
      initial: null,
    });

    expect(formset.isValid()).toBe(false);
    expect(formset.errors).toEqual({ '1.city': ['Required'] });
    expect(formset.cleanedData).toBeNull();
  });

  it('should reject a payload without management data', () => {
    const formset = AddressFormSet.create({
      data: { 'addresses-0-street': 'Main St' },
      files: null,
      prefix: 'addresses',
      initial: null,
    });

    expect(formset.forms).toHaveLength(0);
    expect(formset.isValid()).toBe(false);
    expect(formset.nonFormErrors).toEqual([
      'ManagementForm data is missing or has been tampered with',
    ]);
  });

  it('should clamp the item count to the maximum', () => {
    const formset = AddressFormSet.create({
      data: { 'addresses-TOTAL_FORMS': '10' },
      files: null,
      prefix: 'addresses',
      initial: null,
    });

    expect(formset.forms).toHaveLength(3);
    expect(formset.errors['__all__']).toEqual(['Please submit at most 3 forms.']);
  });

  it('should bind queryset rows as item instances for model formsets', () => {
    const ModelFormSet = defineFormSet('AddressModelFormSet', AddressForm, {
      kind: 'model-formset',
      extra: 0,
    });
    const formset = ModelFormSet.create({
      data: null,
      files: null,
      prefix: 'addresses',
      initial: null,
      queryset: [{ street: 'Stored St', city: 'Ogdenville' }],
    });

    expect(formset.forms).toHaveLength(1);
    expect(formset.forms[0]?.value('city')).toBe('Ogdenville');
  });

  it('should keep the parent instance for inline formsets', () => {
    const InlineFormSet = defineFormSet('AddressInlineFormSet', AddressForm, {
      kind: 'inline-formset',
    });
    const parent = { id: 7 };
    const formset = InlineFormSet.create({
      data: null,
      files: null,
      prefix: 'addresses',
      initial: null,
      instance: parent,
    });

    expect(formset.instance).toBe(parent);
  });
});
