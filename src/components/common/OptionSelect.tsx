/**
 * Single-choice dropdown using Headless UI, shared by the analysis controls.
 */

import { Label, Field, Listbox, ListboxButton, ListboxOption, ListboxOptions } from "@headlessui/react";
import { ChevronUpDownIcon, CheckIcon } from "@heroicons/react/20/solid";

export interface SelectOption<T> {
  value: T;
  label: string;
}

interface Props<T extends string | number> {
  label: string;
  value: T;
  options: SelectOption<T>[];
  onChange: (value: T) => void;
  disabled?: boolean;
  testId?: string;
}

export function OptionSelect<T extends string | number>({
  label,
  value,
  options,
  onChange,
  disabled = false,
  testId,
}: Props<T>) {
  const selected = options.find((opt) => opt.value === value);

  return (
    <Field disabled={disabled}>
      <Label className="block text-sm font-medium text-rk-text-secondary mb-2">{label}</Label>
      <Listbox value={value} onChange={onChange}>
        <ListboxButton
          className="relative w-full cursor-default rounded-md bg-rk-bg-surface py-1.5 pl-3 pr-10 text-left text-rk-text-primary ring-1 ring-inset ring-rk-border-default focus-visible:outline-none focus-visible:ring-2 focus-visible:ring-rk-accent-primary sm:text-sm disabled:cursor-not-allowed disabled:bg-rk-bg-primary disabled:text-rk-text-tertiary"
          data-testid={testId}
        >
          <span className="block truncate">{selected?.label ?? String(value)}</span>
          <span className="pointer-events-none absolute inset-y-0 right-0 flex items-center pr-2">
            <ChevronUpDownIcon
              className="h-5 w-5 text-rk-text-tertiary"
              aria-hidden="true"
            />
          </span>
        </ListboxButton>

        <ListboxOptions
          anchor="bottom"
          className="z-50 mt-1 max-h-60 w-[var(--button-width)] overflow-auto rounded-md bg-rk-bg-surface py-1 text-base border border-rk-border-default focus-visible:outline-none sm:text-sm [--anchor-gap:4px]"
        >
          {options.map((opt) => (
            <ListboxOption
              key={opt.value}
              value={opt.value}
              className="group relative cursor-default select-none py-2 pl-3 pr-9 text-rk-text-primary data-[focus]:bg-rk-accent-primary data-[focus]:text-rk-text-primary"
            >
              <span className="block truncate font-normal group-data-[selected]:font-semibold">
                {opt.label}
              </span>
              {value === opt.value && (
                <span className="absolute inset-y-0 right-0 flex items-center pr-4 text-rk-accent-primary group-data-[focus]:text-rk-text-primary">
                  <CheckIcon className="h-5 w-5" aria-hidden="true" />
                </span>
              )}
            </ListboxOption>
          ))}
        </ListboxOptions>
      </Listbox>
    </Field>
  );
}
