import type { Conference } from '../cfptime/schemas.js';

/** Wire-format listings shared by the unit and e2e suites. */
export const conferences: Conference[] = [
  {
    id: 1729,
    name: 'Example Conf',
    cfp_deadline: '2026-03-01',
    conf_start_date: '2026-06-10',
    city: 'Oslo',
    province: '',
    country: 'Norway',
    twitter: '@exampleconf',
    website: 'https://conf.example.com',
    cfp_details: 'https://conf.example.com/cfp',
    speaker_benefits: 'Travel and hotel',
    code_of_conduct: 'https://conf.example.com/coc',
    created_at: '2025-11-02T09:30:00Z',
    number_of_days: 2,
  },
  {
    id: 42,
    name: 'Sample Summit',
    cfp_deadline: '2026-05-15',
    conf_start_date: '2026-09-21',
    city: 'Portland',
    province: 'Oregon',
    country: 'USA',
    twitter: '@samplesummit',
    website: 'https://summit.example.org',
    cfp_details: 'https://summit.example.org/speak',
    speaker_benefits: 'Free ticket',
    code_of_conduct: 'https://summit.example.org/conduct',
    created_at: '2026-01-20T14:00:00Z',
    number_of_days: 3,
  },
];

export const [exampleConf, sampleSummit] = conferences;
