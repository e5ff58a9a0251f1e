/**
 * Small clinical Q&A dataset shared by the core tests.
 * Record 4 is invalid and is skipped, so accepted ids are 0..4.
 */
export const CLINICAL_RECORDS: unknown[] = [
  {
    prompt: 'What is the dose of atezolizumab for NSCLC',
    completion: '1200mg every three weeks',
    cancer_type: 'NSCLC',
    genes: '',
    source: 'label',
    trial_id: 'T-001',
  },
  {
    prompt: 'Which biomarker predicts atezolizumab response in NSCLC?',
    completion: 'PD-L1 expression on tumor cells',
    cancer_type: 'NSCLC',
    genes: 'PD-L1',
  },
  {
    prompt: 'How does atezolizumab block PD-L1?',
    completion: 'It binds PD-L1 and prevents interaction with PD-1 receptors',
    cancer_type: 'NSCLC, SCLC',
    genes: 'PD-L1, PD-1',
  },
  {
    prompt: 'Is atezolizumab approved for urothelial carcinoma?',
    completion: 'Accelerated approval was later withdrawn',
    cancer_type: 'Urothelial carcinoma',
    genes: '',
  },
  { title: 'missing fields' },
  {
    prompt: 'What adverse events are common?',
    completion: 'Fatigue, nausea and decreased appetite',
  },
];
