import { describe, it, expect } from 'vitest'
import {
  confirmDetailPage,
  decodeProtectedEmail,
  extractDetail,
  normalizePhone,
  scrapeCurrentPage,
} from '../../src/crawler/detail-extractor'
import { CHALLENGE_PAGE, FakeSession, detailPage } from '../helpers/fakes'

const URL = 'https://example.com/jane-doe_id_1'

// Key 0x42, "a@b.co"
const PROTECTED_HEX = '422302206c212d'

const FULL_PAGE = `<html><body>
<h1>Jane Doe</h1>
<p>Age: 52</p>
<h2>Phone Numbers</h2>
<div>
  <a href="tel:+12125550101">(212) 555-0101</a>
  <a href="tel:2125550101">212-555-0101</a>
  <a href="/phone/646-555-0102">646.555.0102</a>
  <a href="tel:7185550103">(718) 555-0103</a>
  <a href="tel:3475550104">(347) 555-0104</a>
  <a href="tel:9175550105">(917) 555-0105</a>
  <a href="tel:9295550106">(929) 555-0106</a>
</div>
<h2>Email Addresses</h2>
<div>
  <span class="__cf_email__" data-cfemail="${PROTECTED_HEX}">[email&#160;protected]</span>
  <a href="mailto:Jane.Doe@Example.com?subject=hi">email</a>
  <p>Contact: jane.doe@example.com</p>
</div>
<h2>Current Address</h2>
<div><a href="/address/1-elm-st">1 Elm St Springfield IL 62701</a></div>
<h2>Previous Addresses</h2>
<div>
  <a href="/address/9-oak-ave">9 Oak Ave Springfield IL 62702</a>
  <a href="/address/1-elm-st">1 Elm St Springfield IL 62701</a>
</div>
<h2>Possible Relatives</h2>
<div>
  <a href="/name/john-doe">John Doe</a>
  <a href="/name/john-doe">John Doe</a>
  <a href="/name/amy-doe">Amy Doe</a>
  <a href="/name/amy-doe_id_9">View Details</a>
</div>
<h3>Associated People</h3>
<ul><li><a href="/people/bob-roe">Bob Roe</a></li></ul>
<div id="marital_status_section"><h3>Marital Status</h3><p>Married</p></div>
<div id="current-address-details">Single family home, built 1998</div>
<div id="background-report">No criminal records found.</div>
<div id="faqs"><h2>FAQs</h2><p>Where does Jane live?</p><p>Springfield, IL.</p></div>
</body></html>`

const SITE_PAGE = `<html><body><header class="navbar">PeopleSearch</header>
<h1>Mary Doe</h1>
<h2 id="age-header">Age 54</h2>
<div id="current_address_section">
  <a href="/address/12-oak-st_springfield-il-62701" title="Search people living at 12 Oak St Springfield IL 62701">12 Oak St Springfield IL 62701</a>
</div>
<div id="current-address-details">Owner since 2009, 3 bed</div>
<div id="previous-addresses">
  <a href="/address/4-elm-ave_springfield-il-62702" title="Search people who live at 4 Elm Ave Springfield IL 62702">4 Elm Ave Springfield IL 62702</a>
  <a href="/address/8-pine-rd_peoria-il-61602" title="Search people who live at 8 Pine Rd Peoria IL 61602">8 Pine Rd Peoria IL 61602</a>
</div>
<div id="phone_number_section">
  <a href="/217-555-0101" title="Search people associated with the phone number (217) 555-0101">(217) 555-0101</a>
  <a href="/309-555-0102" title="Search people associated with the phone number (309) 555-0102">(309) 555-0102</a>
</div>
<div id="relative-links"><h3>Possible Relatives</h3>
  <a href="/jane-doe_id_G-111" title="Details for Jane Doe">Jane Doe</a>
  <a href="/bob-doe_id_G-112" title="Details for Bob Doe">Bob Doe</a>
</div>
<div id="associate-links"><h3>Associates</h3>
  <a href="/sam-roe_id_G-113" title="Details for Sam Roe">Sam Roe</a>
</div>
</body></html>`

const card = (age: number, id: number) => `<div class="card"><h2>John Smith</h2><p>Age ${age}</p>
  <a href="/212-555-010${id}" title="Search people associated with the phone number (212) 555-010${id}">(212) 555-010${id}</a>
  <a href="/address/${id}-main-st" title="Search people living at ${id} Main St">${id} Main St</a>
  <a href="/john-smith_id_${id}">View Free Details</a></div>`

const RESULTS_WITH_CARDS = `<html><body><header class="navbar">PeopleSearch</header>
<div id="results">${card(45, 1)}${card(71, 2)}</div>
</body></html>`

describe('normalizePhone', () => {
  it('formats 10-digit numbers and drops a leading country 1', () => {
    expect(normalizePhone('+1 (212) 555-0101')).toBe('(212) 555-0101')
    expect(normalizePhone('212.555.0101')).toBe('(212) 555-0101')
  })

  it('rejects anything that is not 10 digits', () => {
    expect(normalizePhone('555-0101')).toBeNull()
    expect(normalizePhone('22125550101')).toBeNull()
    expect(normalizePhone(undefined)).toBeNull()
  })

  it('is idempotent', () => {
    const once = normalizePhone('1-646-555-0102')
    expect(once).toBe('(646) 555-0102')
    expect(normalizePhone(once)).toBe(once)
  })
})

describe('decodeProtectedEmail', () => {
  it('XORs every byte with the key byte', () => {
    expect(decodeProtectedEmail(PROTECTED_HEX)).toBe('a@b.co')
  })

  it('rejects short, odd-length and non-hex input', () => {
    expect(decodeProtectedEmail('abc')).toBeNull()
    expect(decodeProtectedEmail('12345')).toBeNull()
    expect(decodeProtectedEmail('zz11')).toBeNull()
  })
})

describe('confirmDetailPage', () => {
  it('accepts a detail page in the site markup', () => {
    expect(confirmDetailPage(SITE_PAGE)).toBe(true)
  })

  it('rejects a results list even when its cards carry detail markers', () => {
    expect(confirmDetailPage(RESULTS_WITH_CARDS)).toBe(false)
    expect(confirmDetailPage(RESULTS_WITH_CARDS, 1)).toBe(false)
  })

  it('never accepts a challenge page, even one with detail markers', () => {
    const markers = '<h2 id="age-header">Age 40</h2><a title="Search people associated with the phone number (212) 555-0101">(212) 555-0101</a>'
    expect(confirmDetailPage(CHALLENGE_PAGE.replace('</body>', `${markers}</body>`))).toBe(false)
  })

  it('counts structural markers, not loose text', () => {
    const loose = '<html><body><p>Age 40</p><p>Relatives: Amy Doe</p><p>Call 212-555-0101</p></body></html>'
    expect(confirmDetailPage(loose, 1)).toBe(false)

    const ageOnly = '<html><body><h2 id="age-header">Age 40</h2></body></html>'
    expect(confirmDetailPage(ageOnly, 1)).toBe(true)
    expect(confirmDetailPage(ageOnly)).toBe(false)
  })
})

describe('extractDetail on the site markup', () => {
  const fields = extractDetail(SITE_PAGE, URL)

  it('reads relatives and associates from their titled links', () => {
    expect(fields.relatives).toEqual(['Jane Doe', 'Bob Doe'])
    expect(fields.associates).toEqual(['Sam Roe'])
  })

  it('reads age, phones and addresses from the marked elements', () => {
    expect(fields.age).toBe('54')
    expect(fields.phones).toEqual(['(217) 555-0101', '(309) 555-0102'])
    expect(fields.homeAddress).toBe('12 Oak St Springfield IL 62701')
    expect(fields.previousAddresses).toEqual(['4 Elm Ave Springfield IL 62702', '8 Pine Rd Peoria IL 61602'])
    expect(fields.currentAddressDetails).toBe('Owner since 2009, 3 bed')
  })

  it('accepts id-style person links in a box without titles', () => {
    const html = '<html><body><div id="relative-links"><a href="/amy-doe_id_G-7">Amy Doe</a><a href="/about">About</a></div></body></html>'
    expect(extractDetail(html, URL).relatives).toEqual(['Amy Doe'])
  })
})

describe('extractDetail fallbacks', () => {
  const fields = extractDetail(FULL_PAGE, URL)

  it('caps phones at five canonical, distinct numbers', () => {
    expect(fields.phones).toEqual([
      '(212) 555-0101',
      '(646) 555-0102',
      '(718) 555-0103',
      '(347) 555-0104',
      '(917) 555-0105',
    ])
  })

  it('merges protected, mailto and plain-text emails without case duplicates', () => {
    expect(fields.emails).toEqual(['a@b.co', 'Jane.Doe@Example.com'])
  })

  it('takes the first address as home and the rest as previous', () => {
    expect(fields.homeAddress).toBe('1 Elm St Springfield IL 62701')
    expect(fields.previousAddresses).toEqual(['9 Oak Ave Springfield IL 62702'])
  })

  it('reads relatives and associates from their sections', () => {
    expect(fields.relatives).toEqual(['John Doe', 'Amy Doe'])
    expect(fields.associates).toEqual(['Bob Roe'])
  })

  it('reads the single-value sections', () => {
    expect(fields.age).toBe('52')
    expect(fields.maritalStatus).toBe('Married')
    expect(fields.currentAddressDetails).toBe('Single family home, built 1998')
    expect(fields.backgroundSummary).toBe('No criminal records found.')
    expect(fields.faqText).toBe('FAQs\nWhere does Jane live?\nSpringfield, IL.')
    expect(fields.sourceUrl).toBe(URL)
  })

  it('falls back to phone numbers in the page text', () => {
    const html = '<html><body><p>Call 212-555-0101 or 1.646.555.0102</p></body></html>'
    expect(extractDetail(html, URL).phones).toEqual(['(212) 555-0101', '(646) 555-0102'])
  })

  it('falls back to the current-address label', () => {
    const inline = '<html><body><p>Current Address: 5 Pine Rd, Austin, TX</p></body></html>'
    expect(extractDetail(inline, URL).homeAddress).toBe('5 Pine Rd, Austin, TX')

    const nextLine = '<html><body><h2>Current Address</h2><p>7 Birch Ln</p></body></html>'
    expect(extractDetail(nextLine, URL).homeAddress).toBe('7 Birch Ln')
  })

  it('leaves missing fields empty', () => {
    const sparse = extractDetail('<html><body><p>Age 40</p></body></html>', URL)
    expect(sparse).toEqual({
      homeAddress: undefined,
      phones: [],
      age: '40',
      relatives: [],
      associates: [],
      emails: [],
      previousAddresses: [],
      maritalStatus: undefined,
      currentAddressDetails: undefined,
      backgroundSummary: undefined,
      faqText: undefined,
      sourceUrl: URL,
    })
  })
})

describe('scrapeCurrentPage', () => {
  const opts = (session: FakeSession) => ({ detailWaitMs: 1000, minSignals: 2, clock: session.clock })

  it('extracts once the page is confirmed', async () => {
    const session = new FakeSession()
    session.show(URL, detailPage({ name: 'Jane Doe', age: 52, phones: ['(212) 555-0101'], address: '1 Elm St' }))
    const outcome = await scrapeCurrentPage(session, opts(session))
    expect(outcome.ok).toBe(true)
    if (outcome.ok) expect(outcome.fields.phones).toEqual(['(212) 555-0101'])
  })

  it('does not take a results list for a detail page', async () => {
    const session = new FakeSession()
    session.show(URL, RESULTS_WITH_CARDS)
    await expect(scrapeCurrentPage(session, opts(session))).resolves.toEqual({
      ok: false,
      reason: `Detail content not detected after waiting (URL: ${URL})`,
    })
  })

  it('reports an unconfirmed page after detailWaitMs', async () => {
    const session = new FakeSession()
    session.show(URL, '<html><body><p>nothing here</p></body></html>')
    await expect(scrapeCurrentPage(session, opts(session))).resolves.toEqual({
      ok: false,
      reason: `Detail content not detected after waiting (URL: ${URL})`,
    })
    expect(session.now).toBe(1000)
  })

  it('reports a challenge that appears after confirmation', async () => {
    const session = new FakeSession()
    const detail = detailPage({ name: 'Jane Doe', age: 52, phones: ['(212) 555-0101'], address: '1 Elm St' })
    session.show(URL, t => (t < 500 ? detail : CHALLENGE_PAGE))
    await expect(scrapeCurrentPage(session, opts(session))).resolves.toEqual({
      ok: false,
      reason: 'Challenge appeared on detail page (checking your browser)',
    })
  })
})
