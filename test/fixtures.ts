export const LOCALES_XHTML = `<?xml version="1.0" encoding="utf-8"?>
<html xmlns="http://www.w3.org/1999/xhtml">
  <head />
  <body class="locales">
    <div class="locales">
      <div class="locale">
        <span class="locale">en-us</span>
        <span class="name">English (United States)</span>
        <a class="locale-link" href="catalogs/dev15/en-us">Catalog</a>
      </div>
      <div class="locale">
        <span class="locale">de-de</span>
        <a class="locale-link" href="catalogs/dev15/de-de">Catalog</a>
      </div>
    </div>
  </body>
</html>
`;

export const CATALOG_XHTML = `<?xml version="1.0" encoding="utf-8"?>
<html xmlns="http://www.w3.org/1999/xhtml">
  <head />
  <body class="book-groups">
    <div class="book-groups">
      <div class="book-group">
        <span class="id">csharp</span>
        <span class="locale">en-us</span>
        <span class="name">C# Docs</span>
        <span class="description">C# language &amp; compiler</span>
        <span class="vendor">Contoso</span>
        <div class="book">
          <span class="id">intro</span>
          <span class="locale">en-us</span>
          <span class="name">Intro</span>
          <span class="description">Getting started</span>
          <span class="BrandingPackageName">dev15</span>
          <div class="packages">
            <div class="package">
              <span class="name">A</span>
              <span class="deployed">true</span>
              <span class="last-modified">2017-03-01T10:00:00Z</span>
              <span class="package-etag">etag-a</span>
              <a class="current-link" href="packages/a.cab">A.cab</a>
              <span class="package-size-bytes">500000</span>
              <span class="package-size-bytes-uncompressed">2000000</span>
              <a class="package-constituent-link" href="packages/a/constituents">A</a>
            </div>
            <div class="package">
              <span class="name">B</span>
              <span class="last-modified">2017-04-02T08:30:00Z</span>
              <a class="current-link" href="packages/b.cab">B.cab</a>
              <span class="package-size-bytes">1200</span>
            </div>
          </div>
        </div>
        <div class="book">
          <span class="id">reference</span>
          <span class="locale">en-us</span>
          <span class="name">Reference</span>
          <span class="category">Language Reference</span>
          <div class="packages" />
        </div>
      </div>
    </div>
  </body>
</html>
`;
