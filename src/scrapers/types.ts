/**
 * Describes one paginated, asynchronously rendered listing page: where the
 * rows live, how cells are marked, and how the page paginates itself.
 */
export interface ListingSite {
  domain: string;
  url: string;
  /** Class on the outer table; its presence means the page shell has loaded */
  tableClass: string;
  /** Element id of the table body the rows are rendered into */
  tableBodyId: string;
  /** Marker class carried by data rows and absent from structural rows */
  dataRowClass: string;
  /** Class carried by every cell of a data row */
  cellClass: string;
  markers: CellMarkers;
  /** Element id holding the displayed total record count */
  totalRecordsId: string;
  pagination: PaginationMarkup;
  directRequest: DirectRequestEndpoint;
  /** Records per page, used to derive the page count from the total */
  pageSize: number;
}

export interface CellMarkers {
  /** Class of the column that always holds the name */
  fixed: string;
  /** Class of columns that are never read */
  hidden: string;
}

export interface PaginationMarkup {
  /** Selector for the pagination items carrying a page number attribute */
  itemSelector: string;
  /** Attribute holding the one-based page number */
  pageAttribute: string;
  /** Class of prev/next controls, which also carry the page attribute */
  controlClass: string;
  /** Page-global function that loads a zero-based page */
  pageFunction: string;
}

export interface DirectRequestEndpoint {
  path: string;
  /** Query parameter that receives the zero-based page number */
  pageParam: string;
  /** Query parameter that receives the page size */
  sizeParam: string;
  /** Ordering/search parameters sent with every request */
  fixedParams: Readonly<Record<string, string>>;
}
