/**
 * Where the Ensembl Data Slicer keeps its controls. The element ids are the
 * ones the form renders for the Data Slicer tool; they change only when
 * Ensembl rebuilds the form.
 */

import type { SlicerSettings } from './config.js';

export type FormFieldName =
  | 'jobName'
  | 'fileFormat'
  | 'region'
  | 'genotypeUrl'
  | 'filter'
  | 'mappingUrl'
  | 'populations';

export interface TargetForm {
  url: string;
  fields: Record<Exclude<FormFieldName, 'filter'>, string>;
  /** Radio for a filter mode; the mode is the radio's value attribute. */
  filterOption(mode: string): string;
  cookieBanner: string;
  spinner: string;
  /** Clicked after the mapping URL so the form fetches the population list. */
  blurTarget: string;
  submit: string;
  resultsLink: string;
  downloadLink: string;
  failureMarker: string;
}

export const ENSEMBL_DATA_SLICER: TargetForm = {
  url: 'https://www.ensembl.org/Homo_sapiens/Tools/DataSlicer?db=core;expand_form=true',
  fields: {
    jobName: '#BgjfIUsr_1',
    fileFormat: 'select#BgjfIUsr_5',
    region: '#BgjfIUsr_6',
    genotypeUrl: '#BgjfIUsr_10',
    mappingUrl: '#BgjfIUsr_12',
    populations: 'select#BgjfIUsr_16',
  },
  filterOption: (mode) => `input[type="radio"][value="${mode}"]`,
  cookieBanner: 'a#gdpr-agree',
  spinner: 'div.overlay-spinner.spinner',
  blurTarget: 'div#masthead',
  submit: 'input.run_button.fbutton',
  resultsLink: 'a:text-is("[View results]")',
  downloadLink: 'a:text-is("Download results file")',
  failureMarker: '.job-status-failed, ._ticket_failed, div.error',
};

export function resolveTargetForm(settings: Pick<SlicerSettings, 'targetUrl' | 'failureSelector'>): TargetForm {
  return {
    ...ENSEMBL_DATA_SLICER,
    url: settings.targetUrl ?? ENSEMBL_DATA_SLICER.url,
    failureMarker: settings.failureSelector ?? ENSEMBL_DATA_SLICER.failureMarker,
  };
}
